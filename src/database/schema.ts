export const SCHEMA_SQL = `
-- ============================================================
-- Sales Order Core — Database Schema
-- Amounts are integer cents. Timestamps are epoch milliseconds,
-- written by the application (no updated_at triggers).
-- ============================================================

-- Customers
CREATE TABLE IF NOT EXISTS customers (
  id                        INTEGER PRIMARY KEY AUTOINCREMENT,
  name                      TEXT NOT NULL,
  email                     TEXT UNIQUE,
  default_shipping_address  TEXT,
  phone                     TEXT,
  created_at                INTEGER NOT NULL,
  updated_at                INTEGER NOT NULL
);
CREATE INDEX IF NOT EXISTS idx_customers_email ON customers(email);

-- Products
CREATE TABLE IF NOT EXISTS products (
  id               INTEGER PRIMARY KEY AUTOINCREMENT,
  name             TEXT NOT NULL,
  description      TEXT,
  price_cents      INTEGER NOT NULL CHECK (price_cents >= 0),
  inventory_count  INTEGER NOT NULL DEFAULT 0 CHECK (inventory_count >= 0),
  min_stock_level  INTEGER NOT NULL DEFAULT 5 CHECK (min_stock_level >= 0),
  created_at       INTEGER NOT NULL,
  updated_at       INTEGER NOT NULL
);

-- Orders
CREATE TABLE IF NOT EXISTS orders (
  id                    INTEGER PRIMARY KEY AUTOINCREMENT,
  customer_id           INTEGER NOT NULL,
  shipping_address      TEXT NOT NULL,
  total_amount_cents    INTEGER NOT NULL,
  status                TEXT NOT NULL DEFAULT 'pending'
                        CHECK (status IN ('pending', 'processing', 'confirmed', 'shipped', 'delivered', 'cancelled')),
  special_instructions  TEXT,
  created_at            INTEGER NOT NULL,
  updated_at            INTEGER NOT NULL,
  FOREIGN KEY (customer_id) REFERENCES customers(id)
);
CREATE INDEX IF NOT EXISTS idx_orders_customer ON orders(customer_id);
CREATE INDEX IF NOT EXISTS idx_orders_status ON orders(status);

-- Order items (unit price frozen at order time)
CREATE TABLE IF NOT EXISTS order_items (
  id                INTEGER PRIMARY KEY AUTOINCREMENT,
  order_id          INTEGER NOT NULL,
  product_id        INTEGER NOT NULL,
  quantity          INTEGER NOT NULL CHECK (quantity > 0),
  unit_price_cents  INTEGER NOT NULL CHECK (unit_price_cents >= 0),
  created_at        INTEGER NOT NULL,
  FOREIGN KEY (order_id) REFERENCES orders(id) ON DELETE CASCADE,
  FOREIGN KEY (product_id) REFERENCES products(id)
);
CREATE INDEX IF NOT EXISTS idx_order_items_order ON order_items(order_id);
CREATE INDEX IF NOT EXISTS idx_order_items_product ON order_items(product_id);

-- Order + customer + aggregated item list
CREATE VIEW IF NOT EXISTS order_summary AS
SELECT
  o.id                  AS order_id,
  c.name                AS customer_name,
  o.shipping_address    AS shipping_address,
  o.total_amount_cents  AS total_amount_cents,
  o.status              AS status,
  o.created_at          AS order_date,
  COUNT(oi.id)          AS total_items,
  GROUP_CONCAT(p.name || ' (x' || oi.quantity || ')', ', ' ORDER BY oi.id) AS items_list
FROM orders o
JOIN customers c ON c.id = o.customer_id
JOIN order_items oi ON oi.order_id = o.id
JOIN products p ON p.id = oi.product_id
GROUP BY o.id;

-- Stock level per product (same thresholds as classifyStock)
CREATE VIEW IF NOT EXISTS inventory_status AS
SELECT
  p.id,
  p.name,
  p.inventory_count,
  p.min_stock_level,
  CASE
    WHEN p.inventory_count <= p.min_stock_level THEN 'low_stock'
    WHEN p.inventory_count <= p.min_stock_level * 2 THEN 'moderate_stock'
    ELSE 'good_stock'
  END AS stock_status
FROM products p;
`
