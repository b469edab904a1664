import "dotenv/config";
import { randomUUID } from "crypto";
import { db, pool } from "./connection.js";
import { PgDocumentStore } from "../documents/pg_store.js";

/**
 * Seed a demo organisation: one user, a logo asset, the "pletter" layout
 * (bundle under lib/slugs/pletter) and an offer-letter content type.
 */
async function seed() {
  console.log("[seed] Seeding demo data...");
  const store = new PgDocumentStore(db);
  const organisationId = randomUUID();

  const user = await store.createUser({
    name: "Demo Author",
    email: `demo+${organisationId.slice(0, 8)}@example.com`,
    organisationId,
  });

  const logo = await store.createAsset({
    organisationId,
    name: "logo",
    file: "logo.png",
    creatorId: user.id,
  });

  const layout = await store.createLayout({
    organisationId,
    name: "Plain letter",
    slug: "pletter",
    creatorId: user.id,
    assetIds: [logo.id],
  });

  const contentType = await store.createContentType({
    organisationId,
    name: "Offer letter",
    // prefixes are unique across organisations
    prefix: `OFF${organisationId.slice(0, 4).toUpperCase()}`,
    layoutId: layout.id,
    creatorId: user.id,
    fields: [
      { name: "employee", fieldType: "string" },
      { name: "position", fieldType: "string" },
      { name: "joining_date", fieldType: "date" },
      { name: "salary", fieldType: "number" },
    ],
  });

  console.log(`[seed] user ${user.id} (send as x-user-id)`);
  console.log(`[seed] content type ${contentType.id} (prefix ${contentType.prefix})`);
  console.log(`[seed] place the logo file at uploads/assets/${logo.id}/logo.png`);
  await pool.end();
}

seed().catch((err) => {
  console.error("[seed] Seed failed:", err);
  process.exit(1);
});
