import "dotenv/config";
import { pool, db } from "./connection.js";
import { sql } from "drizzle-orm";

async function migrate() {
  console.log("[migrate] Running migrations...");

  await db.execute(sql`
    CREATE TABLE IF NOT EXISTS users (
      id UUID PRIMARY KEY DEFAULT gen_random_uuid(),
      name TEXT NOT NULL,
      email VARCHAR(255) NOT NULL UNIQUE,
      organisation_id UUID NOT NULL,
      created_at TIMESTAMP NOT NULL DEFAULT NOW()
    )
  `);

  await db.execute(sql`
    CREATE TABLE IF NOT EXISTS layouts (
      id UUID PRIMARY KEY DEFAULT gen_random_uuid(),
      organisation_id UUID NOT NULL,
      name TEXT NOT NULL,
      slug VARCHAR(100) NOT NULL,
      creator_id UUID NOT NULL REFERENCES users(id),
      created_at TIMESTAMP NOT NULL DEFAULT NOW(),
      updated_at TIMESTAMP NOT NULL DEFAULT NOW()
    )
  `);

  await db.execute(sql`
    CREATE TABLE IF NOT EXISTS assets (
      id UUID PRIMARY KEY DEFAULT gen_random_uuid(),
      organisation_id UUID NOT NULL,
      name VARCHAR(100) NOT NULL,
      file TEXT NOT NULL,
      creator_id UUID NOT NULL REFERENCES users(id),
      created_at TIMESTAMP NOT NULL DEFAULT NOW()
    )
  `);

  await db.execute(sql`
    CREATE TABLE IF NOT EXISTS layout_assets (
      id SERIAL PRIMARY KEY,
      layout_id UUID NOT NULL REFERENCES layouts(id) ON DELETE CASCADE,
      asset_id UUID NOT NULL REFERENCES assets(id) ON DELETE CASCADE,
      position INTEGER NOT NULL
    )
  `);

  await db.execute(sql`
    CREATE TABLE IF NOT EXISTS content_types (
      id UUID PRIMARY KEY DEFAULT gen_random_uuid(),
      organisation_id UUID NOT NULL,
      name TEXT NOT NULL,
      prefix VARCHAR(20) NOT NULL UNIQUE,
      layout_id UUID NOT NULL REFERENCES layouts(id),
      creator_id UUID NOT NULL REFERENCES users(id),
      created_at TIMESTAMP NOT NULL DEFAULT NOW(),
      updated_at TIMESTAMP NOT NULL DEFAULT NOW()
    )
  `);

  // Databases created before prefixes became unique lack the constraint.
  await db.execute(sql`
    CREATE UNIQUE INDEX IF NOT EXISTS content_types_prefix_key ON content_types (prefix)
  `);

  await db.execute(sql`
    CREATE TABLE IF NOT EXISTS content_type_fields (
      id UUID PRIMARY KEY DEFAULT gen_random_uuid(),
      content_type_id UUID NOT NULL REFERENCES content_types(id) ON DELETE CASCADE,
      name VARCHAR(100) NOT NULL,
      field_type VARCHAR(30) NOT NULL,
      position INTEGER NOT NULL
    )
  `);

  await db.execute(sql`
    CREATE TABLE IF NOT EXISTS instances (
      id UUID PRIMARY KEY DEFAULT gen_random_uuid(),
      instance_code VARCHAR(40) NOT NULL UNIQUE,
      serialized JSONB NOT NULL,
      raw TEXT NOT NULL,
      content_type_id UUID NOT NULL REFERENCES content_types(id),
      state_id UUID,
      creator_id UUID NOT NULL REFERENCES users(id),
      created_at TIMESTAMP NOT NULL DEFAULT NOW(),
      updated_at TIMESTAMP NOT NULL DEFAULT NOW()
    )
  `);

  await db.execute(sql`
    CREATE TABLE IF NOT EXISTS build_histories (
      id UUID PRIMARY KEY DEFAULT gen_random_uuid(),
      instance_id UUID NOT NULL REFERENCES instances(id) ON DELETE CASCADE,
      creator_id UUID NOT NULL REFERENCES users(id),
      status VARCHAR(10) NOT NULL,
      exit_code INTEGER NOT NULL,
      start_time TIMESTAMP(3) NOT NULL,
      end_time TIMESTAMP(3) NOT NULL,
      delay INTEGER NOT NULL,
      inserted_at TIMESTAMP(3) NOT NULL DEFAULT NOW()
    )
  `);

  await db.execute(sql`
    CREATE INDEX IF NOT EXISTS build_histories_instance_exit_idx
      ON build_histories (instance_id, exit_code, inserted_at DESC)
  `);

  await db.execute(sql`
    CREATE TABLE IF NOT EXISTS counters (
      id SERIAL PRIMARY KEY,
      subject VARCHAR(100) NOT NULL UNIQUE,
      count INTEGER NOT NULL
    )
  `);

  await db.execute(sql`
    CREATE TABLE IF NOT EXISTS themes (
      id UUID PRIMARY KEY DEFAULT gen_random_uuid(),
      organisation_id UUID NOT NULL,
      name TEXT NOT NULL,
      font TEXT NOT NULL,
      typescale JSONB NOT NULL,
      file TEXT,
      creator_id UUID NOT NULL REFERENCES users(id),
      created_at TIMESTAMP NOT NULL DEFAULT NOW(),
      updated_at TIMESTAMP NOT NULL DEFAULT NOW()
    )
  `);

  await db.execute(sql`
    CREATE TABLE IF NOT EXISTS data_templates (
      id UUID PRIMARY KEY DEFAULT gen_random_uuid(),
      tag TEXT NOT NULL,
      data TEXT NOT NULL,
      content_type_id UUID NOT NULL REFERENCES content_types(id) ON DELETE CASCADE,
      creator_id UUID NOT NULL REFERENCES users(id),
      created_at TIMESTAMP NOT NULL DEFAULT NOW(),
      updated_at TIMESTAMP NOT NULL DEFAULT NOW()
    )
  `);

  console.log("[migrate] Migrations complete.");
  await pool.end();
}

migrate().catch((err) => {
  console.error("[migrate] Migration failed:", err);
  process.exit(1);
});
