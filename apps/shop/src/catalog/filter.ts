import type { CategorySelection, FilterQuery, Product } from '../types'

// ---------------------------------------------------------------------------
// Category selection
// ---------------------------------------------------------------------------

export const ALL_CATEGORIES: CategorySelection = Object.freeze({ kind: 'all' })

export function selectCategory(label: string): CategorySelection {
  return { kind: 'category', label }
}

export function selectedLabel(selection: CategorySelection): string | null {
  return selection.kind === 'category' ? selection.label : null
}

export function isSelected(selection: CategorySelection, label: string): boolean {
  return selection.kind === 'category' && selection.label === label
}

/** Clicking the selected chip clears the selection; any other chip replaces it. */
export function toggleCategory(current: CategorySelection, clicked: string): CategorySelection {
  return isSelected(current, clicked) ? ALL_CATEGORIES : selectCategory(clicked)
}

// ---------------------------------------------------------------------------
// Query
// ---------------------------------------------------------------------------

export const EMPTY_QUERY: FilterQuery = Object.freeze({ text: '', category: ALL_CATEGORIES })

/** True when the query narrows the catalog at all. */
export function isFiltering(query: FilterQuery): boolean {
  return query.text.length > 0 || query.category.kind === 'category'
}

/**
 * Case folding one code point at a time, so the result keeps the input's
 * code point count. A letter is first mapped to its single uppercase form
 * (ς and σ both become Σ), then lowercased; a lowercase that expands to
 * several code points (İ → i̇) keeps only the base letter.
 */
function foldCase(s: string): string {
  return Array.from(s, (c) => {
    const upper = c.toUpperCase()
    const single = Array.from(upper).length === 1 ? upper : c
    const [base] = Array.from(single.toLowerCase())
    return base
  }).join('')
}

/**
 * Text matches when blank, or when it occurs (ignoring case) in the name or
 * the description. Non-blank text is matched as typed, surrounding spaces
 * included. Category equality is exact.
 */
export function matchesQuery(product: Product, query: FilterQuery): boolean {
  const text = query.text
  if (text.trim().length > 0) {
    const needle = foldCase(text)
    if (!foldCase(product.name).includes(needle) && !foldCase(product.description).includes(needle)) {
      return false
    }
  }
  return query.category.kind === 'all' || product.category === query.category.label
}

/** Stable: survivors keep their catalog order. */
export function filterProducts(products: readonly Product[], query: FilterQuery): Product[] {
  return products.filter(p => matchesQuery(p, query))
}

// ---------------------------------------------------------------------------
// Category index
// ---------------------------------------------------------------------------

/**
 * Distinct categories in ascending code-unit order, for the filter chips.
 * An empty category has no chip.
 */
export function categoriesOf(products: readonly Product[]): string[] {
  const labels = new Set<string>()
  for (const p of products) {
    if (p.category !== '') labels.add(p.category)
  }
  return [...labels].sort()
}
