import type Database from 'better-sqlite3'
import { getDb } from '../../database/db'
import type { Customer } from '../../database/db'
import { logger } from '../../utils/logger'

export type CustomerInput = {
  name: string
  email?: string | null
  default_shipping_address?: string | null
  phone?: string | null
}

export type CustomerContactUpdate = Partial<Omit<CustomerInput, 'name'>> & { name?: string }

function normalizeEmail(email: string | null | undefined): string | null {
  const trimmed = email?.trim().toLowerCase()
  return trimmed ? trimmed : null
}

/**
 * Get or create a customer. An email identifies a returning customer;
 * without one a new customer is always registered.
 */
export function upsertCustomer(input: CustomerInput, db: Database.Database = getDb()): Customer {
  const email = normalizeEmail(input.email)

  if (email) {
    const existing = getCustomerByEmail(email, db)
    if (existing) return existing
  }

  const name = input.name.trim()
  if (!name) throw new Error('Customer name is required')

  const now = Date.now()
  const result = db.prepare(`
    INSERT INTO customers (name, email, default_shipping_address, phone, created_at, updated_at)
    VALUES (?, ?, ?, ?, ?, ?)
  `).run(name, email, input.default_shipping_address?.trim() || null, input.phone?.trim() || null, now, now)

  const customerId = Number(result.lastInsertRowid)
  logger.info('New customer registered', { customerId, email })

  const customer = getCustomerById(customerId, db)
  if (!customer) throw new Error(`Customer ${customerId} vanished after insert`)
  return customer
}

/** Get customer by ID */
export function getCustomerById(id: number, db: Database.Database = getDb()): Customer | undefined {
  return db.prepare<[number], Customer>(`SELECT * FROM customers WHERE id = ?`).get(id)
}

/** Get customer by email (case-insensitive) */
export function getCustomerByEmail(email: string, db: Database.Database = getDb()): Customer | undefined {
  const normalized = normalizeEmail(email)
  if (!normalized) return undefined
  return db.prepare<[string], Customer>(`SELECT * FROM customers WHERE email = ?`).get(normalized)
}

/**
 * Update mutable contact fields. The customer's id never changes.
 * Returns false when the customer does not exist.
 */
export function updateCustomerContact(
  customerId: number,
  changes: CustomerContactUpdate,
  db: Database.Database = getDb()
): boolean {
  const fields: string[] = []
  const values: (string | null)[] = []

  if (changes.name !== undefined) {
    const name = changes.name.trim()
    if (!name) throw new Error('Customer name cannot be blank')
    fields.push('name = ?'); values.push(name)
  }
  if (changes.email !== undefined) { fields.push('email = ?'); values.push(normalizeEmail(changes.email)) }
  if (changes.default_shipping_address !== undefined) {
    fields.push('default_shipping_address = ?'); values.push(changes.default_shipping_address?.trim() || null)
  }
  if (changes.phone !== undefined) { fields.push('phone = ?'); values.push(changes.phone?.trim() || null) }

  if (fields.length === 0) return getCustomerById(customerId, db) !== undefined

  const result = db.prepare(`
    UPDATE customers SET ${fields.join(', ')}, updated_at = ? WHERE id = ?
  `).run(...values, Date.now(), customerId)
  return result.changes === 1
}

/** List customers (newest first) */
export function listCustomers(limit = 100, offset = 0, db: Database.Database = getDb()): Customer[] {
  return db.prepare<[number, number], Customer>(`
    SELECT * FROM customers ORDER BY created_at DESC, id DESC LIMIT ? OFFSET ?
  `).all(limit, offset)
}
