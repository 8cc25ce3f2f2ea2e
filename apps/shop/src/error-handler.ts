import { createErrorHandler } from '@shopfront/errors'
import type { AppError, ErrorHandler } from '@shopfront/errors'
import type { Subscription } from 'rxjs'

export function formatAppError(e: AppError): string {
  return `[shop][${e.source}]${e.context ? ` ${e.context}:` : ''} ${e.message}`
}

/** The shop's error bus: every reported error is logged with its source and context. */
export function createShopErrorHandler(
  options: { enableGlobalCapture?: boolean } = {},
): [ErrorHandler, Subscription] {
  return createErrorHandler({
    enableGlobalCapture: options.enableGlobalCapture ?? true,
    onError: (e) => console.error(formatAppError(e)),
  })
}
