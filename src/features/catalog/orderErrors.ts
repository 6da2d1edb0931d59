/**
 * Order placement failures.
 *
 * Every failure is returned to the caller as a value with a stable code and
 * a customer-facing message; the chatbot layer decides what to say or retry.
 */

export const ORDER_ERROR_CODES = {
  UNKNOWN_CUSTOMER: 'UNKNOWN_CUSTOMER',
  UNKNOWN_PRODUCT: 'UNKNOWN_PRODUCT',
  INVALID_ITEM: 'INVALID_ITEM',
  MISSING_SHIPPING_ADDRESS: 'MISSING_SHIPPING_ADDRESS',
  INSUFFICIENT_STOCK: 'INSUFFICIENT_STOCK',
  PERSISTENCE_FAILURE: 'PERSISTENCE_FAILURE',
} as const

export type OrderErrorCode = (typeof ORDER_ERROR_CODES)[keyof typeof ORDER_ERROR_CODES]

export type StockShortfall = {
  productId: number
  productName: string
  requested: number
  available: number
}

export type OrderPlacementError =
  | { code: 'UNKNOWN_CUSTOMER'; message: string; customerId: number }
  | { code: 'UNKNOWN_PRODUCT'; message: string; productId: number; index: number }
  | { code: 'INVALID_ITEM'; message: string; index: number | null; reason: string }
  | { code: 'MISSING_SHIPPING_ADDRESS'; message: string }
  | { code: 'INSUFFICIENT_STOCK'; message: string; shortfalls: StockShortfall[] }
  | { code: 'PERSISTENCE_FAILURE'; message: string }

// ---- Constructors ----

export function unknownCustomer(customerId: number): OrderPlacementError {
  return { code: ORDER_ERROR_CODES.UNKNOWN_CUSTOMER, message: `Customer ${customerId} was not found`, customerId }
}

export function unknownProduct(productId: number, index: number): OrderPlacementError {
  return {
    code: ORDER_ERROR_CODES.UNKNOWN_PRODUCT,
    message: `Product ${productId} (item ${index + 1}) was not found`,
    productId,
    index,
  }
}

export function invalidItem(index: number | null, reason: string): OrderPlacementError {
  const message = index === null ? reason : `Item ${index + 1}: ${reason}`
  return { code: ORDER_ERROR_CODES.INVALID_ITEM, message, index, reason }
}

export function missingShippingAddress(): OrderPlacementError {
  return {
    code: ORDER_ERROR_CODES.MISSING_SHIPPING_ADDRESS,
    message: 'No shipping address was given and the customer has no default address',
  }
}

export function insufficientStock(shortfalls: StockShortfall[]): OrderPlacementError {
  const lines = shortfalls.map(s => `${s.productName}: requested ${s.requested}, only ${s.available} available`)
  return {
    code: ORDER_ERROR_CODES.INSUFFICIENT_STOCK,
    message: `Insufficient stock. ${lines.join('; ')}`,
    shortfalls,
  }
}

export function persistenceFailure(cause: unknown): OrderPlacementError {
  const detail = cause instanceof Error ? cause.message : String(cause)
  return { code: ORDER_ERROR_CODES.PERSISTENCE_FAILURE, message: `Order could not be saved: ${detail}` }
}

// ---- Error class ----

/**
 * Thrown inside the placement transaction so better-sqlite3 rolls it back,
 * then unwrapped into a result by the caller.
 */
export class OrderPlacementAbort extends Error {
  readonly detail: OrderPlacementError

  constructor(detail: OrderPlacementError) {
    super(detail.message)
    this.name = 'OrderPlacementAbort'
    this.detail = detail
    Object.setPrototypeOf(this, OrderPlacementAbort.prototype)
  }
}
