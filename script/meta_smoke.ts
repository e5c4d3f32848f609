// Environment variables are loaded here (process entrypoint), never in library modules.
import dotenv from "dotenv";
dotenv.config();

import { bigserial, pgTable, text } from "drizzle-orm/pg-core";
import {
  InMemoryChangeHistorySink,
  TableHostRecord,
  createDatabase,
  createMetaStack,
  loadMetaConfig,
  withClient,
  type MetaConfig,
  type MetaDatabase,
} from "../platform/meta";

const products = pgTable("smoke_products", {
  id: bigserial("id", { mode: "number" }).primaryKey(),
  name: text("name").notNull(),
});

async function run(config: MetaConfig, db?: MetaDatabase) {
  const { overlayFor, sink } = createMetaStack(
    { ...config, history: config.history === "off" ? "memory" : config.history },
    db,
    { actor: () => "smoke" },
  );

  // 1) Writes before the first save are queued
  const host = new TableHostRecord(products, { name: "Desk lamp" });
  const overlay = overlayFor(host);
  await overlay.setAttribute("color", "red");
  await overlay.setAttribute("dimensions", { width: 20, height: 45 });
  if (overlay.pendingWrites().size !== 2) throw new Error("Expected two queued meta writes before save.");

  // 2) Save assigns an identity; the queue flushes and the cache reloads
  host.markPersisted(Date.now());
  const flushed = await overlay.afterSave();
  console.log("Flushed:", flushed.dispatched.map((d) => `${d.key}:${d.action}`));

  // 3) A fresh fetch of the same record sees the stored attributes
  const fetched = overlayFor(new TableHostRecord(products, host.toRow()));
  await fetched.afterFetch();
  const color = await fetched.getAttribute("color");
  if (color !== "red") throw new Error(`Expected color "red" after fetch, got ${JSON.stringify(color)}.`);

  // 4) Update then delete through the queue
  await fetched.setAttribute("color", "blue");
  await fetched.setAttribute("dimensions", null);
  await fetched.afterSave();

  console.log("Meta smoke test: OK");
  console.log("Attributes:", fetched.getAllAttributes());
  if (sink instanceof InMemoryChangeHistorySink) {
    console.log("History:", sink.records.map((r) => `${r.eventKind} ${r.fieldName}: ${r.oldValue} -> ${r.newValue}`));
  }
}

async function main() {
  const config = loadMetaConfig();
  if (!config.databaseUrl) {
    await run(config);
    return;
  }

  const handle = createDatabase(config.databaseUrl);
  try {
    await withClient(handle.pool, (db) => run(config, db));
  } finally {
    await handle.close();
  }
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
