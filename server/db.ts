import { drizzle, type NodePgDatabase } from "drizzle-orm/node-postgres";
import pkg from "pg";
const { Pool } = pkg;
import * as schema from "@shared/schema";
import { config } from "./config";

const connectionString = config.databaseUrl;

if (!connectionString) {
  throw new Error(
    "Database connection string must be set. Provide EXTERNAL_DATABASE_URL or DATABASE_URL.",
  );
}

export const pool = new Pool({
  connectionString,
  ssl: config.useSSL ? { rejectUnauthorized: false } : undefined,
});

export type Database = NodePgDatabase<typeof schema>;

export const db: Database = drizzle(pool, { schema });

// Run startup migrations to ensure schema is up to date
export async function runStartupMigrations(): Promise<void> {
  const client = await pool.connect();
  try {
    await client.query(`
      CREATE TABLE IF NOT EXISTS stores (
        id integer PRIMARY KEY GENERATED ALWAYS AS IDENTITY,
        name varchar(200) NOT NULL,
        enabled boolean NOT NULL DEFAULT true,
        erp_base_url text NOT NULL DEFAULT 'https://go.s1cloud.net/s1services',
        erp_app_id varchar(50) NOT NULL DEFAULT '',
        erp_token text NOT NULL DEFAULT '',
        erp_s1_code varchar(100) NOT NULL DEFAULT '',
        erp_filters text NOT NULL DEFAULT 'ITEM.MTRL_ITEMTRDATA_QTY1=1&ITEM.MTRL_ITEMTRDATA_QTY1_TO=9999',
        storefront_url text NOT NULL DEFAULT '',
        storefront_key text NOT NULL DEFAULT '',
        storefront_secret text NOT NULL DEFAULT '',
        atum_location_id integer NOT NULL DEFAULT 0,
        atum_location_name varchar(200) NOT NULL DEFAULT '',
        settings jsonb NOT NULL DEFAULT '{}'::jsonb,
        last_sync_at timestamp,
        created_at timestamp DEFAULT now() NOT NULL,
        updated_at timestamp DEFAULT now() NOT NULL
      )
    `);
    console.log("Checked stores table");

    await client.query(`
      CREATE TABLE IF NOT EXISTS products (
        id integer PRIMARY KEY GENERATED ALWAYS AS IDENTITY,
        store_id integer NOT NULL REFERENCES stores(id) ON DELETE CASCADE,
        internal_id varchar(50) NOT NULL DEFAULT '',
        legacy_source_id varchar(100) NOT NULL DEFAULT '',
        sku varchar(100) NOT NULL DEFAULT '',
        barcode varchar(100) NOT NULL DEFAULT '',
        storefront_id varchar(50) NOT NULL DEFAULT '',
        inventory_ext_id varchar(50) NOT NULL DEFAULT '',
        name text NOT NULL DEFAULT '',
        category varchar(100) NOT NULL DEFAULT '',
        unit varchar(50) NOT NULL DEFAULT '',
        product_group varchar(100) NOT NULL DEFAULT '',
        vat varchar(50) NOT NULL DEFAULT '',
        source_quantity double precision NOT NULL DEFAULT 0,
        ext_quantity integer NOT NULL DEFAULT 0,
        retail_price double precision,
        wholesale_price double precision,
        sale_price double precision,
        purchase_price double precision,
        discount double precision,
        last_synced_at timestamp,
        last_sync_status varchar(200) NOT NULL DEFAULT '',
        last_sync_error text,
        created_at timestamp DEFAULT now() NOT NULL,
        updated_at timestamp DEFAULT now() NOT NULL
      )
    `);
    // Empty SKUs are exempt from uniqueness
    await client.query(`
      CREATE UNIQUE INDEX IF NOT EXISTS products_store_sku_idx
      ON products(store_id, sku) WHERE sku <> ''
    `);
    await client.query(`CREATE INDEX IF NOT EXISTS products_store_internal_id_idx ON products(store_id, internal_id)`);
    await client.query(`CREATE INDEX IF NOT EXISTS products_store_inventory_ext_id_idx ON products(store_id, inventory_ext_id)`);
    console.log("Checked products table and indexes");

    await client.query(`
      CREATE TABLE IF NOT EXISTS sync_runs (
        id integer PRIMARY KEY GENERATED ALWAYS AS IDENTITY,
        store_id integer NOT NULL REFERENCES stores(id) ON DELETE CASCADE,
        trigger varchar(20) NOT NULL DEFAULT 'manual',
        status varchar(20) NOT NULL DEFAULT 'running',
        processed integer NOT NULL DEFAULT 0,
        created integer NOT NULL DEFAULT 0,
        updated integer NOT NULL DEFAULT 0,
        skipped integer NOT NULL DEFAULT 0,
        errors integer NOT NULL DEFAULT 0,
        error_details text,
        started_at timestamp DEFAULT now() NOT NULL,
        completed_at timestamp
      )
    `);
    await client.query(`CREATE INDEX IF NOT EXISTS sync_runs_store_started_idx ON sync_runs(store_id, started_at)`);
    console.log("Checked sync_runs table");

    // Runs left in 'running' by a crashed process can never finish
    const staleResult = await client.query(`
      UPDATE sync_runs
      SET status = 'failed', completed_at = now(), error_details = 'Interrupted by server restart'
      WHERE status = 'running'
    `);
    if ((staleResult.rowCount ?? 0) > 0) {
      console.log(`Closed ${staleResult.rowCount} interrupted sync runs`);
    }
  } finally {
    client.release();
  }
}
