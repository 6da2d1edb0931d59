import Database from 'better-sqlite3'
import path from 'path'
import fs from 'fs'
import { config } from '../config'
import { SCHEMA_SQL } from './schema'
import { logger } from '../utils/logger'

const IN_MEMORY = ':memory:'

let _db: Database.Database | null = null

/**
 * Open a new connection to `dbPath` and make sure the schema exists.
 * Each call returns an independent connection; `getDb()` keeps the shared one.
 */
export function openDb(dbPath: string, busyTimeoutMs = config.database.busyTimeoutMs): Database.Database {
  let target = dbPath
  if (dbPath !== IN_MEMORY) {
    target = path.resolve(dbPath)
    const dbDir = path.dirname(target)
    if (!fs.existsSync(dbDir)) {
      fs.mkdirSync(dbDir, { recursive: true })
    }
  }

  const db = new Database(target, { timeout: busyTimeoutMs })
  db.pragma('journal_mode = WAL')
  db.pragma('foreign_keys = ON')

  // Run schema
  db.exec(SCHEMA_SQL)
  return db
}

export function getDb(): Database.Database {
  if (_db) return _db

  _db = openDb(config.database.path)
  logger.info('Database initialized', { path: config.database.path })
  return _db
}

export function closeDb(): void {
  _db?.close()
  _db = null
}

// ---- Typed rows ----

export const ORDER_STATUSES = ['pending', 'processing', 'confirmed', 'shipped', 'delivered', 'cancelled'] as const

export type OrderStatus = typeof ORDER_STATUSES[number]

export type Customer = {
  id: number
  name: string
  email: string | null
  default_shipping_address: string | null
  phone: string | null
  created_at: number
  updated_at: number
}

export type Product = {
  id: number
  name: string
  description: string | null
  price_cents: number
  inventory_count: number
  min_stock_level: number
  created_at: number
  updated_at: number
}

export type Order = {
  id: number
  customer_id: number
  shipping_address: string
  total_amount_cents: number
  status: OrderStatus
  special_instructions: string | null
  created_at: number
  updated_at: number
}

export type OrderItem = {
  id: number
  order_id: number
  product_id: number
  quantity: number
  unit_price_cents: number
  created_at: number
}

export type StockStatus = 'low_stock' | 'moderate_stock' | 'good_stock'

export type OrderSummaryRow = {
  order_id: number
  customer_name: string
  shipping_address: string
  total_amount_cents: number
  status: OrderStatus
  order_date: number
  total_items: number
  items_list: string
}

export type InventoryStatusRow = {
  id: number
  name: string
  inventory_count: number
  min_stock_level: number
  stock_status: StockStatus
}
