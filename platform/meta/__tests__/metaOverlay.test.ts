import { describe, it, expect, vi, beforeEach } from "vitest";
import { bigserial, integer, pgTable, text } from "drizzle-orm/pg-core";
import { createDevMetaOverlay } from "../core";
import { ChangeHistoryRecorder, NoopChangeHistorySink } from "../history";
import { MetaOverlay, TableHostRecord } from "../overlay";
import { InMemoryCompanionStore, type MetaEntry, type OwnerId } from "../store";
import {
  MetaFlushError,
  MetaInvariantViolation,
  StoreFailure,
  UnsupportedMetaValue,
  UnsupportedTypeTag,
} from "../errors";

const products = pgTable("products", {
  id: bigserial("id", { mode: "number" }).primaryKey(),
  name: text("name"),
  price: integer("price"),
});

function newProduct(values: Record<string, unknown> = { name: "Desk lamp" }) {
  return new TableHostRecord(products, values);
}

function savedProduct(id = 1, values: Record<string, unknown> = { name: "Desk lamp", price: 30 }) {
  return new TableHostRecord(products, { id, ...values });
}

async function seed(store: InMemoryCompanionStore, ownerId: OwnerId, key: string, text: string, type: "string" | "integer") {
  await store.ensureTable("products");
  await store.upsert("products", ownerId, key, { text, type });
}

describe("MetaOverlay", () => {
  let dev: ReturnType<typeof createDevMetaOverlay>;

  beforeEach(() => {
    dev = createDevMetaOverlay({}, { clock: () => new Date("2025-03-01T12:00:00Z"), actor: () => "user-1" });
  });

  describe("writes", () => {
    it("queues meta writes until the host record is durable", async () => {
      const overlay = dev.overlayFor(newProduct());

      await overlay.setAttribute("color", "red");

      expect(overlay.pendingWrites().get("color")).toEqual({ value: "red", type: undefined });
      expect(dev.store.tableNames()).toEqual([]);
    });

    it("queues on a durable record when eager write is off", async () => {
      const overlay = dev.overlayFor(savedProduct());

      await overlay.set("color", "red");

      expect(overlay.pendingWrites().size).toBe(1);
      expect(dev.store.rows("products")).toEqual([]);
    });

    it("writes through immediately in eager mode once durable", async () => {
      const overlay = dev.overlayFor(savedProduct(), { eagerWrite: true });

      await overlay.set("color", "red");

      expect(overlay.pendingWrites().size).toBe(0);
      expect(dev.store.rows("products")).toEqual([
        { id: "1", ownerId: 1, key: "color", value: "red", valueType: "string" },
      ]);
    });

    it("routes known columns to the host record", async () => {
      const host = savedProduct();
      const overlay = dev.overlayFor(host);

      await overlay.setAttribute("price", 45);

      expect(host.getColumn("price")).toBe(45);
      expect(overlay.pendingWrites().size).toBe(0);
      expect(await overlay.getAttribute("price")).toBe(45);
    });

    it("rejects unsupported values at assignment time", async () => {
      const overlay = dev.overlayFor(newProduct());

      await expect(overlay.setAttribute("built", new Date(0))).rejects.toBeInstanceOf(UnsupportedMetaValue);
      await expect(overlay.set("ratio", "x", { type: "float" })).rejects.toBeInstanceOf(UnsupportedMetaValue);
      expect(overlay.pendingWrites().size).toBe(0);
    });

    it("keeps only the last queued value per key", async () => {
      const host = newProduct();
      const overlay = dev.overlayFor(host);
      const upsert = vi.spyOn(dev.store, "upsert");

      await overlay.set("a", 1);
      await overlay.set("a", 2);
      host.markPersisted(1);
      await overlay.afterSave();

      expect(upsert).toHaveBeenCalledTimes(1);
      expect(upsert).toHaveBeenCalledWith("products", 1, "a", { text: "2", type: "integer" });
    });

    it("drops a queued value for a key once an eager write supersedes it", async () => {
      const host = newProduct();
      const overlay = dev.overlayFor(host, { eagerWrite: true });

      await overlay.set("a", 1);
      host.markPersisted(1);
      await overlay.set("a", 2);

      expect(overlay.pendingWrites().size).toBe(0);
      await overlay.afterSave();
      expect(await dev.store.find("products", 1, "a")).toMatchObject({ value: "2", valueType: "integer" });
    });

    it("does not replay an entry kept by a failed flush over a later eager write", async () => {
      const host = newProduct();
      const overlay = dev.overlayFor(host, { eagerWrite: true });
      vi.spyOn(dev.store, "upsert").mockRejectedValueOnce(new StoreFailure("upsert", new Error("deadlock detected")));

      await overlay.set("b", 1);
      host.markPersisted(1);
      await expect(overlay.afterSave()).rejects.toBeInstanceOf(MetaFlushError);
      expect(Array.from(overlay.pendingWrites().keys())).toEqual(["b"]);

      await overlay.set("b", 2);
      await overlay.afterSave();

      expect(overlay.pendingWrites().size).toBe(0);
      expect(await dev.store.find("products", 1, "b")).toMatchObject({ value: "2" });
    });

    it("stores an explicitly typed value with that tag", async () => {
      const overlay = dev.overlayFor(savedProduct(), { eagerWrite: true });

      await overlay.set("ratio", 3, { type: "float" });

      expect(dev.store.rows("products")[0]).toMatchObject({ value: "3", valueType: "float" });
    });
  });

  describe("flush", () => {
    it("dispatches the queue on save and reloads the cache", async () => {
      const host = newProduct();
      const overlay = dev.overlayFor(host);
      await overlay.setAttribute("color", "red");
      await overlay.setAttribute("tags", ["new", "sale"]);

      host.markPersisted(1);
      const result = await overlay.afterSave();

      expect(result.dispatched).toEqual([
        { key: "color", action: "created", metaEntryId: "1" },
        { key: "tags", action: "created", metaEntryId: "2" },
      ]);
      expect(overlay.pendingWrites().size).toBe(0);
      expect(overlay.state).toBe("loaded");
      expect(overlay.getMetaAttributes()).toEqual({ color: "red", tags: ["new", "sale"] });
    });

    it("ends in the same stored state as an eager write", async () => {
      const queuedHost = newProduct();
      const queued = dev.overlayFor(queuedHost);
      await queued.set("size", 10);
      queuedHost.markPersisted(1);
      await queued.afterSave();

      const eagerDev = createDevMetaOverlay({ eagerWrite: true });
      await eagerDev.overlayFor(savedProduct(1)).set("size", 10);

      expect(dev.store.rows("products")).toEqual(eagerDev.store.rows("products"));
    });

    it("deletes an existing entry when null is flushed", async () => {
      await seed(dev.store, 1, "color", "red", "string");
      const overlay = dev.overlayFor(savedProduct(1));

      await overlay.setAttribute("color", null);
      const result = await overlay.afterSave();

      expect(result.dispatched).toEqual([{ key: "color", action: "deleted", metaEntryId: "1" }]);
      expect(await dev.store.find("products", 1, "color")).toBeNull();
      expect(await overlay.get("color")).toBeNull();
    });

    it("skips a null write for a key that does not exist", async () => {
      const overlay = dev.overlayFor(savedProduct(1));

      await overlay.set("color", null);
      const result = await overlay.afterSave();

      expect(result.dispatched).toEqual([{ key: "color", action: "skipped" }]);
      expect(dev.store.rows("products")).toEqual([]);
      expect(dev.sink.records).toEqual([]);
    });

    it("refuses to flush before the host has an identity", async () => {
      const overlay = dev.overlayFor(newProduct());
      await overlay.set("color", "red");

      await expect(overlay.flush()).rejects.toBeInstanceOf(MetaInvariantViolation);
      expect(overlay.pendingWrites().size).toBe(1);
    });

    it("keeps failed entries queued and reports them", async () => {
      const host = newProduct();
      const overlay = dev.overlayFor(host);
      const realUpsert = dev.store.upsert.bind(dev.store);
      const upsert = vi
        .spyOn(dev.store, "upsert")
        .mockImplementation(async (ownerTable: string, ownerId: OwnerId, key, value) => {
          if (key === "b") throw new StoreFailure("upsert", new Error("deadlock detected"));
          return realUpsert(ownerTable, ownerId, key, value);
        });

      await overlay.set("a", 1);
      await overlay.set("b", 2);
      await overlay.set("c", 3);
      host.markPersisted(1);

      const err = await overlay.afterSave().catch((e: unknown) => e);

      expect(err).toBeInstanceOf(MetaFlushError);
      expect(err).toMatchObject({ code: "META_FLUSH_PARTIAL", failures: [{ key: "b" }] });
      expect(Array.from(overlay.pendingWrites().keys())).toEqual(["b"]);
      expect(overlay.getMetaAttributes()).toEqual({ a: 1, c: 3 });

      upsert.mockRestore();
      const retry = await overlay.afterSave();

      expect(retry.dispatched).toEqual([{ key: "b", action: "created", metaEntryId: "3" }]);
      expect(overlay.pendingWrites().size).toBe(0);
    });

    it("logs each dispatch through the configured logger", async () => {
      const logger = vi.fn();
      const overlay = dev.overlayFor(savedProduct(1), { logger });

      await overlay.set("color", "red");
      await overlay.afterSave();

      expect(logger).toHaveBeenCalledWith("created color on products#1", "meta-overlay");
      expect(logger).toHaveBeenCalledWith("flushed 1 queued meta write(s)", "meta-overlay");
    });
  });

  describe("history", () => {
    it("records a creation once and ignores a write of the same value", async () => {
      const overlay = dev.overlayFor(savedProduct(1), { eagerWrite: true });

      await overlay.set("size", 10);
      await overlay.set("size", 10);

      expect(dev.sink.records).toEqual([
        {
          tableName: "products",
          rowId: "1",
          metaEntryId: "1",
          eventKind: "created",
          fieldName: "size",
          oldValue: null,
          newValue: "10",
          timestamp: new Date("2025-03-01T12:00:00Z"),
          actor: "user-1",
        },
      ]);
    });

    it("records an update with the previous serialized value", async () => {
      const overlay = dev.overlayFor(savedProduct(1), { eagerWrite: true });

      await overlay.set("size", 10);
      await overlay.set("size", 11);

      expect(dev.sink.records).toHaveLength(2);
      expect(dev.sink.records[1]).toMatchObject({ eventKind: "updated", oldValue: "10", newValue: "11" });
    });

    it("journals a committed change on the next flush when the first append fails", async () => {
      const overlay = dev.overlayFor(savedProduct(1));
      vi.spyOn(dev.sink, "append").mockRejectedValueOnce(new StoreFailure("journal", new Error("connection reset")));

      await overlay.set("size", 10);
      const err = await overlay.afterSave().catch((e: unknown) => e);

      expect(err).toBeInstanceOf(MetaFlushError);
      expect(err).toMatchObject({ failures: [{ key: "size" }] });
      expect(overlay.pendingWrites().size).toBe(0);
      expect(dev.store.rows("products")).toMatchObject([{ key: "size", value: "10" }]);
      expect(dev.sink.records).toEqual([]);

      const retry = await overlay.afterSave();

      expect(retry.dispatched).toEqual([]);
      expect(dev.sink.records).toEqual([
        {
          tableName: "products",
          rowId: "1",
          metaEntryId: "1",
          eventKind: "created",
          fieldName: "size",
          oldValue: null,
          newValue: "10",
          timestamp: new Date("2025-03-01T12:00:00Z"),
          actor: "user-1",
        },
      ]);
    });

    it("keeps an eager write's change for the next flush when the append fails", async () => {
      const overlay = dev.overlayFor(savedProduct(1), { eagerWrite: true });
      vi.spyOn(dev.sink, "append").mockRejectedValueOnce(new StoreFailure("journal", new Error("connection reset")));

      await expect(overlay.set("size", 10)).rejects.toBeInstanceOf(StoreFailure);
      expect(await dev.store.find("products", 1, "size")).toMatchObject({ value: "10" });

      await overlay.afterSave();

      expect(dev.sink.records.map((r) => `${r.eventKind} ${r.fieldName}`)).toEqual(["created size"]);
    });

    it("does not record deletions", async () => {
      const overlay = dev.overlayFor(savedProduct(1), { eagerWrite: true });

      await overlay.set("size", 10);
      await overlay.set("size", null);

      expect(dev.sink.records.map((r) => r.eventKind)).toEqual(["created"]);
    });
  });

  describe("reads", () => {
    it("falls back to a single-key lookup before any load", async () => {
      await seed(dev.store, 1, "color", "red", "string");
      const overlay = dev.overlayFor(savedProduct(1));
      const find = vi.spyOn(dev.store, "find");

      expect(await overlay.get("color")).toBe("red");
      expect(find).toHaveBeenCalledWith("products", 1, "color");
      expect(overlay.state).toBe("unloaded");
    });

    it("serves loaded keys from the cache", async () => {
      await seed(dev.store, 1, "size", "10", "integer");
      const overlay = dev.overlayFor(savedProduct(1));
      await overlay.afterFetch();
      const find = vi.spyOn(dev.store, "find");

      expect(await overlay.getAttribute("size")).toBe(10);
      expect(find).not.toHaveBeenCalled();
    });

    it("returns null for unknown keys, missing tables and new records", async () => {
      const overlay = dev.overlayFor(savedProduct(1));
      expect(await overlay.get("color")).toBeNull();

      await seed(dev.store, 1, "size", "10", "integer");
      expect(await overlay.get("color")).toBeNull();

      expect(await dev.overlayFor(newProduct()).get("size")).toBeNull();
    });

    it("does not read queued values", async () => {
      const overlay = dev.overlayFor(savedProduct(1));

      await overlay.set("color", "red");

      expect(await overlay.get("color")).toBeNull();
    });

    it("skips the load on fetch when auto load is off", async () => {
      await seed(dev.store, 1, "color", "red", "string");
      const overlay = dev.overlayFor(savedProduct(1), { autoLoad: false });

      await overlay.afterFetch();

      expect(overlay.state).toBe("unloaded");
      expect(overlay.getMetaAttributes()).toEqual({});
    });

    it("refreshes a loaded cache after an eager write", async () => {
      const overlay = dev.overlayFor(savedProduct(1), { eagerWrite: true });
      await overlay.load();

      await overlay.set("color", "red");

      expect(overlay.getMetaAttributes()).toEqual({ color: "red" });
    });

    it("fails a read of an unsupported tag without touching the cache", async () => {
      class LegacyStore extends InMemoryCompanionStore {
        async tableExists(): Promise<boolean> {
          return true;
        }

        async loadAll(): Promise<MetaEntry[]> {
          return [
            { id: "9", ownerId: 1, key: "legacy", value: "x", valueType: "varchar" },
            { id: "10", ownerId: 1, key: "color", value: "red", valueType: "string" },
          ];
        }
      }
      const overlay = new MetaOverlay(
        savedProduct(1),
        new LegacyStore(),
        new ChangeHistoryRecorder(new NoopChangeHistorySink()),
      );
      await overlay.load();

      await expect(overlay.get("legacy")).rejects.toBeInstanceOf(UnsupportedTypeTag);
      expect(await overlay.get("color")).toBe("red");
      expect(() => overlay.getMetaAttributes()).toThrow(UnsupportedTypeTag);
    });
  });

  describe("merged views", () => {
    let overlay: MetaOverlay;

    beforeEach(async () => {
      await seed(dev.store, 1, "color", "red", "string");
      await seed(dev.store, 1, "name", "shadowed", "string");
      overlay = dev.overlayFor(savedProduct(1), { exceptAttributes: ["price"] });
      await overlay.afterFetch();
    });

    it("unions host columns and meta attributes minus the record's except list", () => {
      expect(overlay.getAllAttributes()).toEqual({ id: 1, name: "Desk lamp", color: "red" });
    });

    it("applies a per-call except list to both kinds of attribute", () => {
      expect(overlay.getAttributes(undefined, ["color", "name"])).toEqual({ id: 1 });
    });

    it("returns only the named values when meta is not included", () => {
      expect(overlay.getAttributes(["name", "color", "weight"], [], false)).toEqual({
        name: "Desk lamp",
        color: "red",
        weight: null,
      });
    });

    it("exposes the decoded cache", () => {
      expect(overlay.getMetaAttributes()).toEqual({ color: "red", name: "shadowed" });
    });
  });

  describe("bulk assignment", () => {
    it("assigns safe columns and meta names, refusing the rest", async () => {
      const host = new TableHostRecord(products, { name: "Desk lamp" }, { safeColumns: ["name"] });
      const overlay = dev.overlayFor(host, { unsafeAttributes: ["internalNote"] });

      const skipped = await overlay.setAttributes(
        { name: "Floor lamp", price: 5, color: "red", internalNote: "x" },
        { safeOnly: true },
      );

      expect(skipped).toEqual(["price", "internalNote"]);
      expect(host.getColumn("name")).toBe("Floor lamp");
      expect(host.getColumn("price")).toBeNull();
      expect(Array.from(overlay.pendingWrites().keys())).toEqual(["color"]);
    });

    it("assigns every column when safeOnly is off", async () => {
      const host = new TableHostRecord(products, {}, { safeColumns: ["name"] });
      const overlay = dev.overlayFor(host);

      const skipped = await overlay.setAttributes({ price: 5 });

      expect(skipped).toEqual([]);
      expect(host.getColumn("price")).toBe(5);
    });
  });

  describe("uniqueness", () => {
    it("never holds more than one entry per owner and key", async () => {
      const host = newProduct();
      const overlay = dev.overlayFor(host);
      await overlay.set("color", "red");
      await overlay.set("size", 1);
      host.markPersisted(1);
      await overlay.afterSave();

      const eager = dev.overlayFor(savedProduct(1), { eagerWrite: true });
      await eager.set("color", "blue");
      await eager.set("color", "green");
      await eager.set("size", null);
      await eager.set("size", 2);

      const rows = dev.store.rows("products");
      expect(rows.map((r) => r.key).sort()).toEqual(["color", "size"]);
      expect(await dev.store.find("products", 1, "color")).toMatchObject({ id: "1", value: "green" });
    });
  });

  it("names its companion table after the host table", () => {
    expect(dev.overlayFor(newProduct()).metaTableName()).toBe("products_meta");
  });
});
