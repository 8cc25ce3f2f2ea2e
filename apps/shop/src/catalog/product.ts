import { ValidationError } from '@shopfront/errors'
import type { Product, ProductInput } from '../types'

/**
 * The only way to build a Product. `hasStock` is derived here so it can
 * never disagree with `stock`.
 */
export function createProduct(input: ProductInput): Product {
  if (!Number.isSafeInteger(input.id)) {
    throw new ValidationError('id', `must be an integer, got ${input.id}`)
  }
  if (!Number.isFinite(input.price) || input.price < 0) {
    throw new ValidationError('price', `must be a non-negative number, got ${input.price}`)
  }
  if (!Number.isSafeInteger(input.stock) || input.stock < 0) {
    throw new ValidationError('stock', `must be a non-negative integer, got ${input.stock}`)
  }

  return Object.freeze({
    id: input.id,
    name: input.name,
    description: input.description,
    category: input.category,
    price: input.price,
    stock: input.stock,
    hasStock: input.stock > 0,
    imageRef: input.imageRef,
  })
}

// ---------------------------------------------------------------------------
// Untyped payloads (HTTP bodies, bundled JSON)
// ---------------------------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function readString(raw: Record<string, unknown>, field: string, fallback?: string): string {
  const value = raw[field]
  if (typeof value === 'string') return value
  if (value === undefined && fallback !== undefined) return fallback
  throw new ValidationError(field, 'must be a string')
}

function readNumber(raw: Record<string, unknown>, field: string): number {
  const value = raw[field]
  if (typeof value === 'number') return value
  throw new ValidationError(field, 'must be a number')
}

/** Validates an untrusted payload into a Product. `imageRef` may be absent. */
export function parseProduct(raw: unknown): Product {
  if (!isRecord(raw)) throw new ValidationError('product', 'must be an object')
  return createProduct({
    id: readNumber(raw, 'id'),
    name: readString(raw, 'name'),
    description: readString(raw, 'description'),
    category: readString(raw, 'category'),
    price: readNumber(raw, 'price'),
    stock: readNumber(raw, 'stock'),
    imageRef: readString(raw, 'imageRef', ''),
  })
}

/**
 * Parses a catalog snapshot. Ids must be unique within it; the first
 * offending row is reported by index.
 */
export function parseCatalog(raw: unknown): Product[] {
  if (!Array.isArray(raw)) throw new ValidationError('products', 'must be an array')

  const seen = new Set<number>()
  return raw.map((row: unknown, index) => {
    let product: Product
    try {
      product = parseProduct(row)
    } catch (err) {
      if (err instanceof ValidationError) {
        throw new ValidationError(`products[${index}].${err.field}`, err.detail)
      }
      throw err
    }
    if (seen.has(product.id)) {
      throw new ValidationError(`products[${index}].id`, `duplicate id ${product.id}`)
    }
    seen.add(product.id)
    return product
  })
}
