import type Database from 'better-sqlite3'
import { getDb } from '../../database/db'
import type { Product, StockStatus, InventoryStatusRow } from '../../database/db'
import { parseMoney, formatPrice } from '../../utils/money'

export type ProductInput = {
  name: string
  description?: string | null
  /** Decimal amount, e.g. "2499.99" */
  price: string
  inventory_count?: number
  min_stock_level?: number
}

export type InventoryStatus = {
  productId: number
  name: string
  inventoryCount: number
  minStockLevel: number
  stockStatus: StockStatus
}

const DEFAULT_MIN_STOCK_LEVEL = 5

function assertCount(label: string, value: number): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new Error(`${label} must be a non-negative integer, got ${value}`)
  }
}

export function createProduct(input: ProductInput, db: Database.Database = getDb()): Product {
  const name = input.name.trim()
  if (!name) throw new Error('Product name is required')

  const priceCents = parseMoney(input.price)
  const inventoryCount = input.inventory_count ?? 0
  const minStockLevel = input.min_stock_level ?? DEFAULT_MIN_STOCK_LEVEL
  assertCount('inventory_count', inventoryCount)
  assertCount('min_stock_level', minStockLevel)

  const now = Date.now()
  const result = db.prepare(`
    INSERT INTO products (name, description, price_cents, inventory_count, min_stock_level, created_at, updated_at)
    VALUES (?, ?, ?, ?, ?, ?, ?)
  `).run(name, input.description?.trim() || null, priceCents, inventoryCount, minStockLevel, now, now)

  const product = getProduct(Number(result.lastInsertRowid), db)
  if (!product) throw new Error(`Product ${result.lastInsertRowid} vanished after insert`)
  return product
}

/** Get product by ID */
export function getProduct(id: number, db: Database.Database = getDb()): Product | undefined {
  return db.prepare<[number], Product>(`SELECT * FROM products WHERE id = ?`).get(id)
}

/** Get all products */
export function listProducts(db: Database.Database = getDb()): Product[] {
  return db.prepare<[], Product>(`SELECT * FROM products ORDER BY name, id`).all()
}

/** Search products by name or description */
export function searchProducts(query: string, db: Database.Database = getDb()): Product[] {
  const q = `%${query.trim()}%`
  return db.prepare<[string, string], Product>(`
    SELECT * FROM products
    WHERE name LIKE ? OR description LIKE ?
    ORDER BY name LIMIT 10
  `).all(q, q)
}

/**
 * Change the list price. Items of orders already placed keep the price
 * they were sold at.
 */
export function updateProductPrice(id: number, price: string, db: Database.Database = getDb()): boolean {
  const result = db.prepare(`
    UPDATE products SET price_cents = ?, updated_at = ? WHERE id = ?
  `).run(parseMoney(price), Date.now(), id)
  return result.changes === 1
}

// ---- Inventory status ----

/**
 * Stock level relative to the restocking threshold.
 *   count <= min       → low_stock
 *   count <= 2 × min   → moderate_stock
 *   otherwise          → good_stock
 * Advisory only: it never blocks an order.
 */
export function classifyStock(inventoryCount: number, minStockLevel: number): StockStatus {
  if (inventoryCount <= minStockLevel) return 'low_stock'
  if (inventoryCount <= minStockLevel * 2) return 'moderate_stock'
  return 'good_stock'
}

export function getInventoryStatus(productId: number, db: Database.Database = getDb()): InventoryStatus | null {
  const product = getProduct(productId, db)
  if (!product) return null

  return {
    productId: product.id,
    name: product.name,
    inventoryCount: product.inventory_count,
    minStockLevel: product.min_stock_level,
    stockStatus: classifyStock(product.inventory_count, product.min_stock_level),
  }
}

/** Every product's stock level, read from the inventory_status view */
export function listInventoryStatus(db: Database.Database = getDb()): InventoryStatusRow[] {
  return db.prepare<[], InventoryStatusRow>(`SELECT * FROM inventory_status ORDER BY id`).all()
}

/** Format a product for a chat reply */
export function formatProduct(product: Product): string {
  const status = classifyStock(product.inventory_count, product.min_stock_level)
  const stock = product.inventory_count === 0
    ? 'Out of stock'
    : status === 'low_stock'
      ? `Only ${product.inventory_count} left`
      : `${product.inventory_count} in stock`

  return `${product.name} | ${formatPrice(product.price_cents)} | ${stock}` +
    (product.description ? `\n${product.description}` : '')
}
