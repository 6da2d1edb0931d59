import { describe, it, expect, beforeEach } from 'vitest'
import { getDb, closeDb } from '../../../database/db'
import { upsertCustomer } from '../../crm/customerManager'
import { createProduct } from '../productManager'
import {
  placeOrder,
  getOrder,
  getCustomerOrders,
  getOrderStatuses,
  getOrderSummary,
  updateOrderStatus,
  formatOrder,
} from '../orderManager'
import type { OrderItemRequest, OrderWithItems } from '../orderManager'
import { canTransition, isOrderStatus, isTerminal } from '../orderStatus'

beforeEach(() => {
  closeDb()
  getDb()
})

function place(customerId: number, items: OrderItemRequest[], specialInstructions?: string): OrderWithItems {
  const result = placeOrder({ customerId, items, specialInstructions })
  if (!result.success) throw new Error(result.error.message)
  return result.data
}

describe('getOrderSummary', () => {
  it('aggregates customer and items in line order', () => {
    const customer = upsertCustomer({ name: 'Ada Buyer', default_shipping_address: '123 Main St' })
    const widget = createProduct({ name: 'Widget', price: '10.00', inventory_count: 10 })
    const gadget = createProduct({ name: 'Gadget', price: '3.00', inventory_count: 10 })

    const order = place(customer.id, [
      { productId: widget.id, quantity: 2 },
      { productId: gadget.id, quantity: 1 },
      { productId: widget.id, quantity: 1 },
    ])

    expect(getOrderSummary(order.id)).toEqual({
      order_id: order.id,
      customer_name: 'Ada Buyer',
      shipping_address: '123 Main St',
      total_amount_cents: 3300,
      status: 'pending',
      order_date: order.created_at,
      total_items: 3,
      items_list: 'Widget (x2), Gadget (x1), Widget (x1)',
    })
  })

  it('returns undefined for an unknown order', () => {
    expect(getOrderSummary(999)).toBeUndefined()
  })
})

describe('order history and status checks', () => {
  it('lists a customer’s orders newest first', () => {
    const customer = upsertCustomer({ name: 'Ada Buyer', default_shipping_address: '123 Main St' })
    const other = upsertCustomer({ name: 'Bo Other', default_shipping_address: '5 Side St' })
    const product = createProduct({ name: 'Widget', price: '1.00', inventory_count: 10 })

    const older = place(customer.id, [{ productId: product.id, quantity: 1 }])
    place(other.id, [{ productId: product.id, quantity: 1 }])
    const newer = place(customer.id, [{ productId: product.id, quantity: 2 }])

    const history = getCustomerOrders(customer.id)
    expect(history.map(o => o.id)).toEqual([newer.id, older.id])
    expect(history[0].items.map(i => i.quantity)).toEqual([2])
  })

  it('checks several orders at once and skips unknown ids', () => {
    const customer = upsertCustomer({ name: 'Ada Buyer', default_shipping_address: '123 Main St' })
    const product = createProduct({ name: 'Widget', price: '1.50', inventory_count: 10 })
    const first = place(customer.id, [{ productId: product.id, quantity: 1 }])
    const second = place(customer.id, [{ productId: product.id, quantity: 2 }])

    expect(getOrderStatuses([second.id, 999, first.id])).toEqual([
      { id: first.id, status: 'pending', total_amount_cents: 150, created_at: first.created_at },
      { id: second.id, status: 'pending', total_amount_cents: 300, created_at: second.created_at },
    ])
    expect(getOrderStatuses([])).toEqual([])
  })
})

describe('updateOrderStatus', () => {
  it('walks the fulfilment path', () => {
    const customer = upsertCustomer({ name: 'Ada Buyer', default_shipping_address: '123 Main St' })
    const product = createProduct({ name: 'Widget', price: '1.00', inventory_count: 10 })
    const order = place(customer.id, [{ productId: product.id, quantity: 1 }])

    expect(updateOrderStatus(order.id, 'shipped')).toBe('invalid_transition')
    expect(updateOrderStatus(order.id, 'confirmed')).toBe('updated')
    expect(updateOrderStatus(order.id, 'shipped')).toBe('updated')
    expect(updateOrderStatus(order.id, 'delivered')).toBe('updated')
    expect(updateOrderStatus(order.id, 'cancelled')).toBe('invalid_transition')

    const stored = getOrder(order.id)
    expect(stored?.status).toBe('delivered')
    expect(stored?.updated_at).toBeGreaterThanOrEqual(order.created_at)
  })

  it('reports unknown orders', () => {
    expect(updateOrderStatus(999, 'confirmed')).toBe('not_found')
  })

  it('does not restock cancelled orders', () => {
    const customer = upsertCustomer({ name: 'Ada Buyer', default_shipping_address: '123 Main St' })
    const product = createProduct({ name: 'Widget', price: '1.00', inventory_count: 10 })
    const order = place(customer.id, [{ productId: product.id, quantity: 4 }])

    expect(updateOrderStatus(order.id, 'cancelled')).toBe('updated')
    expect(getOrder(order.id)?.status).toBe('cancelled')
    expect(getDb().prepare<[number], { inventory_count: number }>(
      `SELECT inventory_count FROM products WHERE id = ?`
    ).get(product.id)?.inventory_count).toBe(6)
  })
})

describe('orderStatus', () => {
  it('knows the status values', () => {
    expect(isOrderStatus('shipped')).toBe(true)
    expect(isOrderStatus('lost')).toBe(false)
    expect(isOrderStatus(3)).toBe(false)
  })

  it('treats delivered and cancelled as terminal', () => {
    expect(isTerminal('delivered')).toBe(true)
    expect(isTerminal('cancelled')).toBe(true)
    expect(isTerminal('pending')).toBe(false)
    expect(canTransition('confirmed', 'processing')).toBe(true)
    expect(canTransition('shipped', 'cancelled')).toBe(false)
  })
})

describe('formatOrder', () => {
  it('renders items, total and instructions', () => {
    const customer = upsertCustomer({ name: 'Ada Buyer', default_shipping_address: '123 Main St' })
    const product = createProduct({ name: 'Widget', price: '100.00', inventory_count: 10 })
    const order = place(customer.id, [{ productId: product.id, quantity: 4 }], 'Ring the bell')

    expect(formatOrder(order)).toBe(
      `Order #${order.id}\n` +
      `⏳ Status: PENDING\n` +
      `Ship to: 123 Main St\n\n` +
      `• Widget x4 — USD 400.00\n` +
      `━━━━━━━━━━━━━━━\n` +
      `Total: USD 400.00\n` +
      `Note: Ring the bell`
    )
  })
})
