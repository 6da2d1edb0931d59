/**
 * Seed the database with sample data for testing.
 * Run: npm run seed
 */
import { getDb, closeDb } from './db'
import type { OrderStatus } from './db'
import { upsertCustomer } from '../features/crm/customerManager'
import { createProduct, listProducts } from '../features/catalog/productManager'
import { placeOrder, updateOrderStatus } from '../features/catalog/orderManager'
import type { OrderItemRequest } from '../features/catalog/orderManager'
import { logger } from '../utils/logger'

const db = getDb()

// Each status is reached by walking the normal fulfilment path
const STATUS_PATHS: Record<OrderStatus, OrderStatus[]> = {
  pending: [],
  processing: ['processing'],
  confirmed: ['confirmed'],
  shipped: ['confirmed', 'shipped'],
  delivered: ['confirmed', 'shipped', 'delivered'],
  cancelled: ['cancelled'],
}

function seed() {
  if (listProducts(db).length > 0) {
    logger.info('Database already has products, skipping seed')
    return
  }

  logger.info('Seeding database with sample data...')

  const customers = [
    { name: 'Northwind Traders', email: 'buying@northwind.test', default_shipping_address: '12 Harbor Road, Portside, NY 10001', phone: '555-0101' },
    { name: 'Blue Finch Studio', email: 'orders@bluefinch.test', default_shipping_address: '88 Canvas Lane, Arton, CA 94016', phone: '555-0102' },
    { name: 'Orchard Labs', email: 'procurement@orchardlabs.test', default_shipping_address: '4 Seedling Way, Greenfield, TX 75001', phone: '555-0103' },
    { name: 'Walk-in Customer', email: null, default_shipping_address: null, phone: null },
  ].map(c => upsertCustomer(c, db))

  const products = [
    { name: 'Rack Server 2U', description: 'Dual-socket server with redundant power supplies', price: '2499.99', inventory_count: 50, min_stock_level: 10 },
    { name: 'Business Laptop 14"', description: 'Lightweight laptop for travelling staff', price: '1299.99', inventory_count: 100, min_stock_level: 20 },
    { name: 'Managed Switch 24-Port', description: 'Gigabit switch with VLAN support', price: '399.99', inventory_count: 75, min_stock_level: 15 },
    { name: 'Design Workstation', description: 'Workstation for rendering and CAD', price: '3499.99', inventory_count: 30, min_stock_level: 5 },
    { name: 'NAS 4-Bay', description: 'Network storage with RAID support', price: '899.99', inventory_count: 40, min_stock_level: 8 },
    { name: 'Docking Station', description: 'USB-C dock with dual display output', price: '249.99', inventory_count: 12, min_stock_level: 15 },
  ].map(p => createProduct(p, db))

  const orders: { customer: number; items: OrderItemRequest[]; status: OrderStatus; note?: string; address?: string }[] = [
    { customer: 0, items: [{ productId: products[0].id, quantity: 2 }], status: 'delivered', note: 'Deliver during business hours' },
    { customer: 1, items: [{ productId: products[1].id, quantity: 2 }], status: 'processing', note: 'Signature required' },
    { customer: 2, items: [{ productId: products[2].id, quantity: 4 }, { productId: products[5].id, quantity: 1 }], status: 'pending', address: 'Suite 100, 9 Market Street, Greenfield, TX 75002' },
  ]

  for (const o of orders) {
    const result = placeOrder({
      customerId: customers[o.customer].id,
      items: o.items,
      shippingAddress: o.address,
      specialInstructions: o.note,
    }, db)
    if (!result.success) throw new Error(`Seed order failed: ${result.error.message}`)

    for (const status of STATUS_PATHS[o.status]) {
      updateOrderStatus(result.data.id, status, db)
    }
  }

  logger.info('Seed complete', { customers: customers.length, products: products.length, orders: orders.length })
}

try {
  seed()
} finally {
  closeDb()
}
