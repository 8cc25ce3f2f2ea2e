export interface Product {
  readonly id: number
  readonly name: string
  readonly description: string
  readonly category: string
  readonly price: number
  readonly stock: number
  /** Always `stock > 0`; computed by createProduct, never supplied. */
  readonly hasStock: boolean
  /** Opaque key handed to an ImageResolver. */
  readonly imageRef: string
}

export type ProductInput = Omit<Product, 'hasStock'>

export type CategorySelection =
  | { readonly kind: 'all' }
  | { readonly kind: 'category'; readonly label: string }

export interface FilterQuery {
  readonly text: string
  readonly category: CategorySelection
}

export interface CartItem {
  product: Product
  quantity: number
}

export type CartFailureReason = 'out-of-stock' | 'insufficient-stock' | 'invalid-quantity'

export type CartResult =
  | { ok: true; quantityInCart: number }
  | { ok: false; reason: CartFailureReason }

export type ImageSource =
  | { kind: 'asset'; src: string }
  | { kind: 'remote'; src: string }
  | { kind: 'placeholder'; src: string }
