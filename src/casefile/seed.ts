import type Database from "better-sqlite3";

const DAY_MS = 24 * 60 * 60 * 1000;

function isoDay(base: Date, offsetDays: number): string {
  return new Date(base.getTime() + offsetDays * DAY_MS).toISOString().slice(0, 10);
}

export function defaultBaseDate(now: Date = new Date()): Date {
  return new Date(now.getTime() - 5 * DAY_MS);
}

export function createCaseSchema(db: Database.Database): void {
  db.pragma("foreign_keys = ON");

  db.exec(`
    CREATE TABLE IF NOT EXISTS products (
      product_id INTEGER PRIMARY KEY,
      name TEXT,
      category TEXT,
      unit_price DECIMAL(10,2)
    )
  `);

  db.exec(`
    CREATE TABLE IF NOT EXISTS suppliers (
      supplier_id INTEGER PRIMARY KEY,
      name TEXT,
      country TEXT,
      reliability_score INTEGER
    )
  `);

  db.exec(`
    CREATE TABLE IF NOT EXISTS warehouses (
      warehouse_id INTEGER PRIMARY KEY,
      location TEXT,
      capacity INTEGER
    )
  `);

  db.exec(`
    CREATE TABLE IF NOT EXISTS shipments (
      shipment_id INTEGER PRIMARY KEY,
      product_id INTEGER,
      supplier_id INTEGER,
      warehouse_id INTEGER,
      quantity INTEGER,
      shipment_date TEXT,
      received_date TEXT,
      status TEXT,
      FOREIGN KEY (product_id) REFERENCES products(product_id) ON DELETE CASCADE,
      FOREIGN KEY (supplier_id) REFERENCES suppliers(supplier_id) ON DELETE CASCADE,
      FOREIGN KEY (warehouse_id) REFERENCES warehouses(warehouse_id) ON DELETE CASCADE
    )
  `);

  db.exec(`
    CREATE TABLE IF NOT EXISTS inventory (
      inventory_id INTEGER PRIMARY KEY,
      product_id INTEGER,
      warehouse_id INTEGER,
      stock INTEGER,
      last_updated TEXT,
      FOREIGN KEY (product_id) REFERENCES products(product_id) ON DELETE CASCADE,
      FOREIGN KEY (warehouse_id) REFERENCES warehouses(warehouse_id) ON DELETE CASCADE
    )
  `);
}

function isEmpty(db: Database.Database, table: string): boolean {
  return db.prepare(`SELECT COUNT(*) FROM ${table}`).pluck().get() === 0;
}

/**
 * Seeds the mystery data. Each group is only inserted into an empty table, so
 * re-running on an existing database is a no-op. Dates hang off `baseDate`.
 */
export function seedCaseData(db: Database.Database, baseDate: Date = defaultBaseDate()): void {
  const day = (offset: number) => isoDay(baseDate, offset);
  const base = day(0);

  const seed = db.transaction(() => {
    if (isEmpty(db, "products")) {
      const insert = db.prepare(`INSERT INTO products VALUES (?, ?, ?, ?)`);
      insert.run(1, "Widget", "Tools", 49.99);
      insert.run(2, "Gadget", "Electronics", 149.99);
      insert.run(3, "Doodad", "Accessories", 29.99);
      insert.run(4, "Thingamajig", "Tools", 79.99);
      insert.run(5, "Whatsit", "Electronics", 199.99);
    }

    if (isEmpty(db, "suppliers")) {
      const insert = db.prepare(`INSERT INTO suppliers VALUES (?, ?, ?, ?)`);
      insert.run(1, "Acme Corp", "USA", 95);
      insert.run(2, "Globex", "Germany", 88);
      insert.run(3, "Initech", "Japan", 92);
    }

    if (isEmpty(db, "warehouses")) {
      const insert = db.prepare(`INSERT INTO warehouses VALUES (?, ?, ?)`);
      insert.run(1, "New York", 1000);
      insert.run(2, "Berlin", 750);
      insert.run(3, "Tokyo", 500);
    }

    if (isEmpty(db, "inventory")) {
      const insert = db.prepare(`INSERT INTO inventory VALUES (?, ?, ?, ?, ?)`);
      // Widget: more in stock than was ever shipped in.
      insert.run(1, 1, 1, 200, base);
      insert.run(2, 2, 2, 150, base);
      insert.run(3, 3, 3, 100, base);
      // Thingamajig: not received yet.
      insert.run(4, 4, 2, 0, base);
      insert.run(5, 5, 1, 500, base);
    }

    if (isEmpty(db, "shipments")) {
      const insert = db.prepare(
        `INSERT INTO shipments
           (shipment_id, product_id, supplier_id, warehouse_id, quantity, shipment_date, received_date, status)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?)`
      );
      insert.run(1, 1, 1, 1, 150, base, base, "delivered");
      insert.run(2, 2, 2, 2, 200, base, base, "delivered");
      insert.run(3, 2, 2, 2, 100, base, base, "delivered");
      insert.run(4, 2, 2, 2, 150, base, null, "in_transit");
      insert.run(5, 3, 3, 3, 100, base, base, "delivered");
      // Received two days before it shipped.
      insert.run(6, 4, 2, 2, 50, base, day(-2), "delivered");
      insert.run(7, 5, 2, 1, 200, day(-10), day(-8), "delivered");
      insert.run(8, 5, 2, 1, 200, day(-5), day(-4), "delivered");
      insert.run(9, 5, 1, 1, 100, day(-3), day(-2), "delivered");
    }
  });

  seed();
}
