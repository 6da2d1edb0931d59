import { ORDER_STATUSES } from '../../database/db'
import type { OrderStatus } from '../../database/db'

/**
 * Order status flow (fulfilment side):
 *
 *   pending → processing ⇄ confirmed → shipped → delivered
 *      ↓          ↓           ↓
 *   cancelled  cancelled   cancelled
 *
 * pending may also go straight to confirmed. delivered and cancelled are terminal.
 */
export const ORDER_STATUS_TRANSITIONS: Record<OrderStatus, readonly OrderStatus[]> = {
  pending: ['processing', 'confirmed', 'cancelled'],
  processing: ['confirmed', 'shipped', 'cancelled'],
  confirmed: ['processing', 'shipped', 'cancelled'],
  shipped: ['delivered'],
  delivered: [],
  cancelled: [],
}

export function isOrderStatus(value: unknown): value is OrderStatus {
  return typeof value === 'string' && ORDER_STATUSES.some(status => status === value)
}

export function canTransition(from: OrderStatus, to: OrderStatus): boolean {
  return ORDER_STATUS_TRANSITIONS[from].includes(to)
}

export function isTerminal(status: OrderStatus): boolean {
  return ORDER_STATUS_TRANSITIONS[status].length === 0
}
