import { config } from '../config'

const DECIMAL_AMOUNT = /^(\d+)(?:\.(\d{1,2}))?$/

/**
 * Parse a decimal amount ("2499.99", "100", "0.5") into integer cents.
 * Amounts are never handled as floating point past this point.
 */
export function parseMoney(amount: string): number {
  const match = DECIMAL_AMOUNT.exec(amount.trim())
  if (!match) throw new Error(`Invalid money amount: "${amount}"`)

  const whole = parseInt(match[1], 10)
  const fraction = parseInt((match[2] || '0').padEnd(2, '0'), 10)
  const cents = whole * 100 + fraction
  if (!Number.isSafeInteger(cents)) throw new Error(`Money amount out of range: "${amount}"`)
  return cents
}

/** 40000 → "400.00" */
export function formatMoney(cents: number): string {
  const sign = cents < 0 ? '-' : ''
  const abs = Math.abs(cents)
  const whole = Math.floor(abs / 100)
  const fraction = String(abs % 100).padStart(2, '0')
  return `${sign}${whole}.${fraction}`
}

/** 40000 → "USD 400.00" */
export function formatPrice(cents: number, currency = config.business.currency): string {
  return `${currency} ${formatMoney(cents)}`
}
