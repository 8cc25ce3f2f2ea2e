import { Subscription } from 'rxjs'
import { createHttpClient } from '@shopfront/http'
import type { HttpClient, HttpInterceptor } from '@shopfront/http'
import type { ErrorHandler } from '@shopfront/errors'
import type { ShopConfig } from './config'
import { createShopErrorHandler } from './error-handler'
import { createLogger } from './devtools/logger'
import { parseCatalog } from './catalog/product'
import { createHttpCatalogService, createInMemoryCatalogService } from './services/catalog.service'
import type { ProductCatalogService } from './services/catalog.service'
import { createCartService } from './services/cart.service'
import { createImageResolver } from './services/image-resolver'
import { createCartStore } from './store/cart.store'
import type { CartStore } from './store/cart.store'
import { createCatalogScreen } from './screens/catalog.screen'
import type { CatalogScreen } from './screens/catalog.screen'
import { createProductDetailScreen } from './screens/product-detail.screen'
import type { ProductDetailScreen } from './screens/product-detail.screen'
import seedProducts from './data/products.json'
import imageAssets from './data/image-assets.json'

export const PLACEHOLDER_IMAGE = '/images/placeholder.svg'

// ---------------------------------------------------------------------------
// Interceptors
// ---------------------------------------------------------------------------

/** Logs each request with its full URL; the client resolves baseUrl first. */
export const loggingInterceptor: HttpInterceptor = {
  request: (config) => {
    console.log(`[shop] ${config.method ?? 'GET'} ${config.url}`)
    return config
  },
}

// ---------------------------------------------------------------------------
// App
// ---------------------------------------------------------------------------

export interface ShopAppDeps {
  config: ShopConfig
  /** Replaces the rxjs/ajax client built from config. */
  http?: HttpClient
  /** Replaces the catalog chosen by `config.catalogSource`. */
  catalog?: ProductCatalogService
  /** Listen for window errors (default true). */
  enableGlobalCapture?: boolean
}

export interface ShopApp {
  errorHandler: ErrorHandler
  cart: CartStore
  openCatalog(): CatalogScreen
  openProduct(id: number): ProductDetailScreen
  /** Destroys every screen still open, then the shared services. */
  destroy(): void
}

function createCatalog(deps: ShopAppDeps): ProductCatalogService {
  if (deps.catalog) return deps.catalog
  if (deps.config.catalogSource === 'memory') {
    return createInMemoryCatalogService(parseCatalog(seedProducts))
  }
  const http = deps.http ?? createHttpClient({
    baseUrl: deps.config.apiBaseUrl,
    timeoutMs: deps.config.httpTimeoutMs,
    interceptors: deps.config.debug ? [loggingInterceptor] : [],
  })
  return createHttpCatalogService(http)
}

export function createShopApp(deps: ShopAppDeps): ShopApp {
  const { config } = deps
  const [errorHandler, errorSub] = createShopErrorHandler({
    enableGlobalCapture: deps.enableGlobalCapture,
  })
  const catalog = createCatalog(deps)
  const cart = createCartStore()
  const cartService = createCartService(cart)
  const images = createImageResolver({ assets: imageAssets, placeholder: PLACEHOLDER_IMAGE })

  const devtools = new Subscription()
  if (config.debug) devtools.add(createLogger(cart, 'Cart'))

  const open = new Set<{ destroy(): void }>()

  function track<T extends { destroy(): void }>(screen: T, logger: Subscription): T {
    const destroy = screen.destroy
    const tracked = {
      ...screen,
      destroy() {
        logger.unsubscribe()
        open.delete(tracked)
        destroy()
      },
    }
    open.add(tracked)
    return tracked
  }

  function openCatalog(): CatalogScreen {
    const screen = createCatalogScreen({ catalog, images, errorHandler })
    return track(screen, config.debug ? createLogger(screen.store, 'Catalog') : new Subscription())
  }

  function openProduct(id: number): ProductDetailScreen {
    const screen = createProductDetailScreen({
      productId: id,
      catalog,
      cart: cartService,
      images,
      errorHandler,
      confirmationMs: config.confirmationDismissMs,
    })
    return track(screen, config.debug ? createLogger(screen.store, `Product ${id}`) : new Subscription())
  }

  return {
    errorHandler,
    cart,
    openCatalog,
    openProduct,
    destroy() {
      for (const screen of [...open]) screen.destroy()
      devtools.unsubscribe()
      cart.destroy()
      errorSub.unsubscribe()
    },
  }
}
