import type Database from 'better-sqlite3'
import { getDb } from '../../database/db'
import type { Order, OrderItem, OrderStatus, OrderSummaryRow, Product, StockStatus } from '../../database/db'
import { getCustomerById } from '../crm/customerManager'
import { getProduct, classifyStock } from './productManager'
import {
  OrderPlacementAbort,
  insufficientStock,
  invalidItem,
  missingShippingAddress,
  persistenceFailure,
  unknownCustomer,
  unknownProduct,
} from './orderErrors'
import type { OrderPlacementError, StockShortfall } from './orderErrors'
import { canTransition } from './orderStatus'
import { formatPrice } from '../../utils/money'
import { logger } from '../../utils/logger'

export type OrderItemRequest = {
  productId: number
  quantity: number
}

/** Structured order request, as extracted from a chat message */
export type PlaceOrderRequest = {
  customerId: number
  items: OrderItemRequest[]
  /** Blank or missing falls back to the customer's default address */
  shippingAddress?: string | null
  specialInstructions?: string | null
}

export type OrderItemWithName = OrderItem & { product_name: string }

export type OrderWithItems = Order & { items: OrderItemWithName[] }

export type PlaceOrderResult =
  | { success: true; data: OrderWithItems }
  | { success: false; error: OrderPlacementError }

export type ProductAvailability = {
  productId: number
  productName: string
  requested: number
  available: number
  sufficient: boolean
  /** Stock level the product would be left at; null when the order cannot be filled */
  stockStatusAfter: StockStatus | null
}

export type OrderPreview = {
  totalAmountCents: number
  products: ProductAvailability[]
  shortfalls: StockShortfall[]
}

export type OrderPreviewResult =
  | { success: true; data: OrderPreview }
  | { success: false; error: OrderPlacementError }

export type OrderStatusSnapshot = Pick<Order, 'id' | 'status' | 'total_amount_cents' | 'created_at'>

export type OrderStatusUpdate = 'updated' | 'not_found' | 'invalid_transition'

type PricedLine = {
  product: Product
  quantity: number
}

type ProductDemand = {
  product: Product
  requested: number
}

// ---- Request checks ----

/** Shape checks that need no database access */
function validateItems(items: OrderItemRequest[]): OrderPlacementError | null {
  if (items.length === 0) return invalidItem(null, 'An order needs at least one item')

  for (const [index, item] of items.entries()) {
    if (!Number.isInteger(item.productId) || item.productId <= 0) {
      return invalidItem(index, `product reference must be a positive integer, got ${item.productId}`)
    }
    if (!Number.isInteger(item.quantity) || item.quantity <= 0) {
      return invalidItem(index, `quantity must be a positive integer, got ${item.quantity}`)
    }
  }
  return null
}

/** Resolve every product up front; the first unknown reference aborts */
function resolveProducts(items: OrderItemRequest[], db: Database.Database): PricedLine[] {
  const seen = new Map<number, Product>()

  return items.map((item, index) => {
    let product = seen.get(item.productId)
    if (!product) {
      product = getProduct(item.productId, db)
      if (!product) throw new OrderPlacementAbort(unknownProduct(item.productId, index))
      seen.set(item.productId, product)
    }
    return { product, quantity: item.quantity }
  })
}

/** Total requested per product, duplicates summed, in first-appearance order */
function sumByProduct(lines: PricedLine[]): ProductDemand[] {
  const demand = new Map<number, ProductDemand>()
  for (const line of lines) {
    const entry = demand.get(line.product.id)
    if (entry) entry.requested += line.quantity
    else demand.set(line.product.id, { product: line.product, requested: line.quantity })
  }
  return [...demand.values()]
}

function findShortfalls(demand: ProductDemand[]): StockShortfall[] {
  return demand
    .filter(d => d.product.inventory_count < d.requested)
    .map(d => ({
      productId: d.product.id,
      productName: d.product.name,
      requested: d.requested,
      available: d.product.inventory_count,
    }))
}

function totalOf(lines: PricedLine[]): number {
  const total = lines.reduce((sum, line) => sum + line.quantity * line.product.price_cents, 0)
  if (!Number.isSafeInteger(total)) throw new OrderPlacementAbort(invalidItem(null, 'Order total is too large'))
  return total
}

// ---- Placement ----

function insertOrder(req: PlaceOrderRequest, db: Database.Database): OrderWithItems {
  const customer = getCustomerById(req.customerId, db)
  if (!customer) throw new OrderPlacementAbort(unknownCustomer(req.customerId))

  const shippingAddress = req.shippingAddress?.trim() || customer.default_shipping_address?.trim()
  if (!shippingAddress) throw new OrderPlacementAbort(missingShippingAddress())

  const lines = resolveProducts(req.items, db)
  const demand = sumByProduct(lines)

  const shortfalls = findShortfalls(demand)
  if (shortfalls.length > 0) throw new OrderPlacementAbort(insufficientStock(shortfalls))

  const now = Date.now()

  // Compare-and-set: a row that no longer covers the request is left untouched
  const decrement = db.prepare(`
    UPDATE products
    SET inventory_count = inventory_count - ?, updated_at = ?
    WHERE id = ? AND inventory_count >= ?
  `)
  for (const { product, requested } of demand) {
    if (decrement.run(requested, now, product.id, requested).changes !== 1) {
      const available = getProduct(product.id, db)?.inventory_count ?? 0
      throw new OrderPlacementAbort(insufficientStock([
        { productId: product.id, productName: product.name, requested, available },
      ]))
    }
  }

  const orderResult = db.prepare(`
    INSERT INTO orders (customer_id, shipping_address, total_amount_cents, status, special_instructions, created_at, updated_at)
    VALUES (?, ?, ?, 'pending', ?, ?, ?)
  `).run(customer.id, shippingAddress, totalOf(lines), req.specialInstructions?.trim() || null, now, now)

  const orderId = Number(orderResult.lastInsertRowid)

  const insertItem = db.prepare(`
    INSERT INTO order_items (order_id, product_id, quantity, unit_price_cents, created_at)
    VALUES (?, ?, ?, ?, ?)
  `)
  for (const line of lines) {
    insertItem.run(orderId, line.product.id, line.quantity, line.product.price_cents, now)
  }

  const order = getOrderWithItems(orderId, db)
  if (!order) throw new Error(`Order ${orderId} vanished after insert`)
  return order
}

/**
 * Place an order atomically.
 *
 * Validation, the stock check, the inventory decrements and the order rows all
 * run in one BEGIN IMMEDIATE transaction, so the check-then-decrement is
 * serialized against every other writer on the database. Any failure rolls
 * the whole transaction back.
 */
export function placeOrder(request: PlaceOrderRequest, db: Database.Database = getDb()): PlaceOrderResult {
  const invalid = validateItems(request.items)
  if (invalid) {
    logger.warn('Order rejected', { customerId: request.customerId, code: invalid.code, reason: invalid.message })
    return { success: false, error: invalid }
  }

  try {
    const order = db.transaction(insertOrder).immediate(request, db)
    logger.info('Order placed', {
      orderId: order.id,
      customerId: order.customer_id,
      items: order.items.length,
      totalCents: order.total_amount_cents,
    })
    return { success: true, data: order }
  } catch (err) {
    if (err instanceof OrderPlacementAbort) {
      logger.warn('Order rejected', { customerId: request.customerId, code: err.detail.code, reason: err.detail.message })
      return { success: false, error: err.detail }
    }
    logger.error('Order placement failed', {
      customerId: request.customerId,
      err: err instanceof Error ? err.message : String(err),
    })
    return { success: false, error: persistenceFailure(err) }
  }
}

/**
 * Run the stock check for a prospective order without changing anything.
 * Reports every product's shortfall and the stock level an order would
 * leave it at, so a reply can warn before stock drops to low_stock.
 */
export function previewOrder(items: OrderItemRequest[], db: Database.Database = getDb()): OrderPreviewResult {
  const invalid = validateItems(items)
  if (invalid) return { success: false, error: invalid }

  try {
    return db.transaction((): OrderPreviewResult => {
      const lines = resolveProducts(items, db)
      const demand = sumByProduct(lines)

      const products = demand.map(({ product, requested }): ProductAvailability => {
        const sufficient = product.inventory_count >= requested
        return {
          productId: product.id,
          productName: product.name,
          requested,
          available: product.inventory_count,
          sufficient,
          stockStatusAfter: sufficient
            ? classifyStock(product.inventory_count - requested, product.min_stock_level)
            : null,
        }
      })

      return {
        success: true,
        data: { totalAmountCents: totalOf(lines), products, shortfalls: findShortfalls(demand) },
      }
    })()
  } catch (err) {
    if (err instanceof OrderPlacementAbort) return { success: false, error: err.detail }
    throw err
  }
}

// ---- Queries ----

/** Get order by ID */
export function getOrder(orderId: number, db: Database.Database = getDb()): Order | undefined {
  return db.prepare<[number], Order>(`SELECT * FROM orders WHERE id = ?`).get(orderId)
}

function getOrderItems(orderId: number, db: Database.Database): OrderItemWithName[] {
  return db.prepare<[number], OrderItemWithName>(`
    SELECT oi.*, p.name AS product_name
    FROM order_items oi
    JOIN products p ON p.id = oi.product_id
    WHERE oi.order_id = ?
    ORDER BY oi.id
  `).all(orderId)
}

/** Get order with items, in the order they were requested */
export function getOrderWithItems(orderId: number, db: Database.Database = getDb()): OrderWithItems | undefined {
  const order = getOrder(orderId, db)
  if (!order) return undefined
  return { ...order, items: getOrderItems(orderId, db) }
}

/** Order history for a customer, newest first */
export function getCustomerOrders(customerId: number, db: Database.Database = getDb()): OrderWithItems[] {
  const orders = db.prepare<[number], Order>(`
    SELECT * FROM orders WHERE customer_id = ? ORDER BY created_at DESC, id DESC
  `).all(customerId)

  return orders.map(o => ({ ...o, items: getOrderItems(o.id, db) }))
}

/** Status of several orders at once; unknown ids are skipped */
export function getOrderStatuses(orderIds: number[], db: Database.Database = getDb()): OrderStatusSnapshot[] {
  if (orderIds.length === 0) return []
  const placeholders = orderIds.map(() => '?').join(', ')
  return db.prepare<number[], OrderStatusSnapshot>(`
    SELECT id, status, total_amount_cents, created_at
    FROM orders WHERE id IN (${placeholders})
    ORDER BY id
  `).all(...orderIds)
}

/** Order + customer + item list, from the order_summary view */
export function getOrderSummary(orderId: number, db: Database.Database = getDb()): OrderSummaryRow | undefined {
  return db.prepare<[number], OrderSummaryRow>(`SELECT * FROM order_summary WHERE order_id = ?`).get(orderId)
}

// ---- Fulfilment ----

/** Move an order along its status flow; updated_at changes with the status */
export function updateOrderStatus(
  orderId: number,
  status: OrderStatus,
  db: Database.Database = getDb()
): OrderStatusUpdate {
  return db.transaction((): OrderStatusUpdate => {
    const order = getOrder(orderId, db)
    if (!order) return 'not_found'
    if (!canTransition(order.status, status)) return 'invalid_transition'

    db.prepare(`
      UPDATE orders SET status = ?, updated_at = ? WHERE id = ? AND status = ?
    `).run(status, Date.now(), orderId, order.status)

    logger.info('Order status updated', { orderId, from: order.status, to: status })
    return 'updated'
  }).immediate()
}

// ---- Formatting ----

const STATUS_EMOJI: Record<OrderStatus, string> = {
  pending: '⏳',
  processing: '🔄',
  confirmed: '✅',
  shipped: '🚚',
  delivered: '📦',
  cancelled: '❌',
}

/** Format a single order for a chat reply */
export function formatOrder(order: OrderWithItems): string {
  let msg = `Order #${order.id}\n`
  msg += `${STATUS_EMOJI[order.status]} Status: ${order.status.toUpperCase()}\n`
  msg += `Ship to: ${order.shipping_address}\n\n`

  for (const item of order.items) {
    msg += `• ${item.product_name} x${item.quantity} — ${formatPrice(item.unit_price_cents * item.quantity)}\n`
  }

  msg += `━━━━━━━━━━━━━━━\n`
  msg += `Total: ${formatPrice(order.total_amount_cents)}`
  if (order.special_instructions) msg += `\nNote: ${order.special_instructions}`
  return msg
}
