/**
 * Sales Order Core
 *
 * Order placement, inventory status and order views behind a sales chatbot.
 * The chatbot turns a customer message into a structured order request and
 * calls placeOrder; everything it gets back is a typed result.
 */

export { config } from './config'
export { getDb, openDb, closeDb, ORDER_STATUSES } from './database/db'
export type {
  Customer,
  Product,
  Order,
  OrderItem,
  OrderStatus,
  StockStatus,
  OrderSummaryRow,
  InventoryStatusRow,
} from './database/db'

export {
  upsertCustomer,
  getCustomerById,
  getCustomerByEmail,
  updateCustomerContact,
  listCustomers,
} from './features/crm/customerManager'
export type { CustomerInput, CustomerContactUpdate } from './features/crm/customerManager'

export {
  createProduct,
  getProduct,
  listProducts,
  searchProducts,
  updateProductPrice,
  classifyStock,
  getInventoryStatus,
  listInventoryStatus,
  formatProduct,
} from './features/catalog/productManager'
export type { ProductInput, InventoryStatus } from './features/catalog/productManager'

export {
  placeOrder,
  previewOrder,
  getOrder,
  getOrderWithItems,
  getCustomerOrders,
  getOrderStatuses,
  getOrderSummary,
  updateOrderStatus,
  formatOrder,
} from './features/catalog/orderManager'
export type {
  OrderItemRequest,
  PlaceOrderRequest,
  PlaceOrderResult,
  OrderWithItems,
  OrderItemWithName,
  OrderPreview,
  OrderPreviewResult,
  ProductAvailability,
  OrderStatusSnapshot,
  OrderStatusUpdate,
} from './features/catalog/orderManager'

export { ORDER_ERROR_CODES, OrderPlacementAbort } from './features/catalog/orderErrors'
export type { OrderErrorCode, OrderPlacementError, StockShortfall } from './features/catalog/orderErrors'

export { ORDER_STATUS_TRANSITIONS, canTransition, isOrderStatus, isTerminal } from './features/catalog/orderStatus'

export { parseMoney, formatMoney, formatPrice } from './utils/money'
export { logger } from './utils/logger'
