export type {
  CartFailureReason,
  CartItem,
  CartResult,
  CategorySelection,
  FilterQuery,
  ImageSource,
  Product,
  ProductInput,
} from './types'
export { createProduct, parseCatalog, parseProduct } from './catalog/product'
export {
  ALL_CATEGORIES,
  EMPTY_QUERY,
  categoriesOf,
  filterProducts,
  isFiltering,
  isSelected,
  matchesQuery,
  selectCategory,
  selectedLabel,
  toggleCategory,
} from './catalog/filter'
export { createHttpCatalogService, createInMemoryCatalogService } from './services/catalog.service'
export type { ProductCatalogService } from './services/catalog.service'
export { createCartService } from './services/cart.service'
export type { CartService } from './services/cart.service'
export { createImageResolver } from './services/image-resolver'
export type { ImageResolver, ImageResolverConfig } from './services/image-resolver'
export { cartCount, cartReducer, cartSubtotal, createCartStore, quantityInCart } from './store/cart.store'
export type { CartAction, CartState, CartStore } from './store/cart.store'
export { createCatalogScreen, deriveCatalogView } from './screens/catalog.screen'
export type { CatalogScreen, CatalogView } from './screens/catalog.screen'
export { createProductDetailScreen, deriveProductDetailView } from './screens/product-detail.screen'
export type { ProductDetailScreen, ProductDetailView } from './screens/product-detail.screen'
export { readConfig } from './config'
export type { ShopConfig } from './config'
export { createShopApp } from './app'
export type { ShopApp, ShopAppDeps } from './app'
