import { decodeRecord, float, text, ValueType } from "./encoding.js";
import { openStore } from "./db.js";
import { InvalidOptionsError, StoreClosedError } from "./errors.js";
import { createLogger } from "./logger.js";

import { beforeEach, expect, suite, test, vi } from "vitest";
import fs, { type FileHandle } from "node:fs/promises";
import os from "node:os";
import path from "node:path";

async function corruptByte(file: string, position: number) {
  const handle = await fs.open(file, "r+");
  const byte = Buffer.alloc(1);
  await handle.read(byte, 0, 1, position);
  byte[0] ^= 0xff;
  await handle.write(byte, 0, 1, position);
  await handle.close();
}

suite("API tests", () => {
  let dir: string;
  let file: string;
  const logger = createLogger("silent");

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "logkv-"));
    file = path.join(dir, "test.db");

    return async () => {
      await fs.rm(dir, { force: true, recursive: true });
    };
  });

  test("put() persists to disk", async () => {
    const db = await openStore(file, { logger });
    const before = Math.floor(Date.now() / 1000);
    await db.put("foo", "bar");
    const after = Math.floor(Date.now() / 1000);
    await db.close();

    const buffer = await fs.readFile(file);
    const entry = decodeRecord(buffer);

    expect(buffer.length).toBe(26);
    expect(entry?.key).toStrictEqual(text("foo"));
    expect(entry?.value).toStrictEqual(text("bar"));
    expect(entry?.timestamp).toBeGreaterThanOrEqual(before);
    expect(entry?.timestamp).toBeLessThanOrEqual(after);
  });

  test("get() reads from disk", async () => {
    const db = await openStore(file, { logger });
    await db.put("foo", "bar");

    const value = await db.get("foo");
    await db.close();

    expect(value).toStrictEqual(text("bar"));
  });

  test("records are appended back to back from offset 0", async () => {
    const db = await openStore(file, { logger });
    await db.put("name", "Sai'd");
    await db.put("lang", "English");

    expect(await db.get("name")).toStrictEqual(text("Sai'd"));
    expect(await db.get("lang")).toStrictEqual(text("English"));
    await db.close();

    const buffer = await fs.readFile(file);
    expect(buffer.length).toBe(29 + 31);
    expect(decodeRecord(buffer.subarray(0, 29))?.key).toStrictEqual(
      text("name"),
    );
    expect(decodeRecord(buffer.subarray(29))?.key).toStrictEqual(text("lang"));
  });

  test("last write wins and both records stay in the file", async () => {
    const db = await openStore(file, { logger });
    await db.put("k", "v1");
    await db.put("k", "v2");

    expect(await db.get("k")).toStrictEqual(text("v2"));
    expect(db.size).toBe(1);
    await db.close();

    const stat = await fs.stat(file);
    expect(stat.size).toBe(2 * (20 + 1 + 2));
  });

  test("repeated reads return the same value", async () => {
    const db = await openStore(file, { logger });
    await db.put("k", "v");

    const values = [await db.get("k"), await db.get("k"), await db.get("k")];
    await db.close();

    expect(values).toStrictEqual([text("v"), text("v"), text("v")]);
  });

  test("missing key is null", async () => {
    const db = await openStore(file, { logger });

    expect(await db.get("absent")).toBeNull();
    await db.close();
  });

  test("integers come back as integers", async () => {
    const db = await openStore(file, { logger });
    await db.put("age", 25);
    await db.put("ratio", 0.75);
    await db.put("whole", float(2));

    expect(await db.get("age")).toStrictEqual({
      type: ValueType.SignedInteger,
      value: 25n,
    });
    expect(await db.get("ratio")).toStrictEqual(float(0.75));
    expect(await db.get("whole")).toStrictEqual(float(2));
    await db.close();
  });

  test("keys of different types are distinct", async () => {
    const db = await openStore(file, { logger });
    await db.put(25, "integer key");
    await db.put("25", "text key");
    await db.put(25.5, "float key");

    expect(await db.get(25)).toStrictEqual(text("integer key"));
    expect(await db.get(25n)).toStrictEqual(text("integer key"));
    expect(await db.get("25")).toStrictEqual(text("text key"));
    expect(await db.get(25.5)).toStrictEqual(text("float key"));
    expect(db.size).toBe(3);
    await db.close();
  });

  test("corrupted payload reads as null", async () => {
    const db = await openStore(file, { logger });
    await db.put("x", "y");
    await db.flush();

    await corruptByte(file, 21);

    expect(await db.get("x")).toBeNull();
    await db.close();
  });

  test("truncated file reads as null", async () => {
    const db = await openStore(file, { logger });
    await db.put("x", "y");
    await db.flush();

    await fs.truncate(file, 10);

    expect(await db.get("x")).toBeNull();
    await db.close();
  });

  test("open existing db replays changes to latest change", async () => {
    let db = await openStore(file, { logger });
    await db.put("foo", "foobar1");
    await db.put("foo", "foobar2");
    await db.put("foo", "foobar3");
    await db.put("bar", 3);
    await db.close();

    db = await openStore(file, { logger });

    expect(await db.get("foo")).toStrictEqual(text("foobar3"));
    expect(await db.get("bar")).toStrictEqual({
      type: ValueType.SignedInteger,
      value: 3n,
    });
    expect(db.listKeys()).toStrictEqual([text("foo"), text("bar")]);
    await db.close();
  });

  test("recover: false starts with an empty directory", async () => {
    let db = await openStore(file, { logger });
    await db.put("foo", "bar");
    await db.close();

    db = await openStore(file, { logger, recover: false });

    expect(await db.get("foo")).toBeNull();

    await db.put("a", "b");
    expect(await db.get("a")).toStrictEqual(text("b"));
    await db.close();

    expect((await fs.stat(file)).size).toBe(26 + 22);
  });

  test("replay stops at a corrupt record", async () => {
    let db = await openStore(file, { logger });
    await db.put("a", "1");
    await db.put("b", "2");
    await db.close();

    await corruptByte(file, 22 + 21);

    const warn = vi.spyOn(logger, "warn");
    db = await openStore(file, { logger });

    expect(warn).toHaveBeenCalledWith("checksum mismatch, replay stopped", {
      file,
      offset: 22,
    });
    expect(await db.get("a")).toStrictEqual(text("1"));
    expect(await db.get("b")).toBeNull();

    // appends continue after the damaged bytes
    await db.put("c", "3");
    expect(await db.get("c")).toStrictEqual(text("3"));
    await db.close();

    expect((await fs.stat(file)).size).toBe(3 * 22);
    warn.mockRestore();
  });

  test("replay ignores a partial trailing record", async () => {
    let db = await openStore(file, { logger });
    await db.put("a", "1");
    await db.put("b", "2");
    await db.close();

    await fs.truncate(file, 22 + 10);

    db = await openStore(file, { logger });

    expect(await db.get("a")).toStrictEqual(text("1"));
    expect(await db.get("b")).toBeNull();
    expect(db.size).toBe(1);
    await db.close();
  });

  test("replay stops at a record that runs past the end of the log", async () => {
    let db = await openStore(file, { logger });
    await db.put("a", "1");
    await db.put("b", "2");
    await db.close();

    await fs.truncate(file, 22 + 21);

    const warn = vi.spyOn(logger, "warn");
    db = await openStore(file, { logger });

    expect(warn).toHaveBeenCalledWith("log ends with a truncated record", {
      file,
      offset: 22,
      size: 22,
    });
    expect(await db.get("a")).toStrictEqual(text("1"));
    expect(db.size).toBe(1);
    await db.close();
    warn.mockRestore();
  });

  test("replay walks many records of different sizes", async () => {
    let db = await openStore(file, { logger });
    for (let index = 1; index <= 50; index++) {
      await db.put(`key${index}`, "v".repeat(index));
    }
    await db.put("key7", 7);
    await db.close();

    db = await openStore(file, { logger });

    expect(db.size).toBe(50);
    expect(await db.get("key50")).toStrictEqual(text("v".repeat(50)));
    expect(await db.get("key7")).toStrictEqual({
      type: ValueType.SignedInteger,
      value: 7n,
    });
    await db.close();
  });

  test("fold() calls callback with key and value", async () => {
    const db = await openStore(file, { logger });

    await db.put("k1", "v1");
    await db.put("k2", "v2");
    await db.put("k3", "v3");
    const callback = vi.fn();

    await db.fold(callback);
    await db.close();

    expect(callback).toBeCalledTimes(3);
    expect(callback).toBeCalledWith(text("k3"), text("v3"));
    expect(callback).toBeCalledWith(text("k1"), text("v1"));
    expect(callback).toBeCalledWith(text("k2"), text("v2"));
  });

  test("listKeys() returns keys in first-write order", async () => {
    const db = await openStore(file, { logger });

    await db.put("k1", "v1");
    await db.put("k2", "v2");
    await db.put("k1", "v3");

    const keys = db.listKeys();
    await db.close();

    expect(keys).toStrictEqual([text("k1"), text("k2")]);
  });

  test("concurrent puts are appended in call order", async () => {
    const db = await openStore(file, { logger });

    await Promise.all([db.put("a", "1"), db.put("b", "2"), db.put("c", "3")]);

    expect(await db.get("a")).toStrictEqual(text("1"));
    expect(await db.get("b")).toStrictEqual(text("2"));
    expect(await db.get("c")).toStrictEqual(text("3"));
    await db.close();

    const buffer = await fs.readFile(file);
    expect(decodeRecord(buffer.subarray(44, 66))?.key).toStrictEqual(text("c"));
  });

  test("get after an un-awaited put sees the new value", async () => {
    const db = await openStore(file, { logger });
    await db.put("k", "v1");

    const overwrite = db.put("k", "v2");
    const created = db.put("n", "x");

    expect(await db.get("k")).toStrictEqual(text("v2"));
    expect(await db.get("n")).toStrictEqual(text("x"));
    await Promise.all([overwrite, created]);
    await db.close();
  });

  test("a failed append rethrows the write error", async () => {
    const db = await openStore(file, { logger });

    const other = await fs.open(file, "r");
    const fileHandlePrototype: FileHandle = Object.getPrototypeOf(other);
    await other.close();

    const error = vi.spyOn(logger, "error");
    const write = vi
      .spyOn(fileHandlePrototype, "write")
      .mockResolvedValueOnce({ bytesWritten: 5, buffer: "" })
      .mockRejectedValueOnce(new Error("disk full"));
    const stat = vi
      .spyOn(fileHandlePrototype, "stat")
      .mockRejectedValueOnce(new Error("stat failed"));

    await expect(db.put("k", "v")).rejects.toThrow("disk full");
    expect(error).toHaveBeenCalledTimes(1);

    write.mockRestore();
    stat.mockRestore();
    error.mockRestore();

    expect(await db.get("k")).toBeNull();
    await db.close();
  });

  test("sync option fsyncs every put", async () => {
    const db = await openStore(file, { logger, sync: true });
    await db.put("k", "v");

    expect(await db.get("k")).toStrictEqual(text("v"));
    await db.close();
  });

  test("missing parent directories are created", async () => {
    const nested = path.join(dir, "a", "b", "store.db");
    const db = await openStore(nested, { logger });
    await db.put("k", "v");
    await db.close();

    expect((await fs.stat(nested)).size).toBe(22);
  });

  test("closed store rejects reads and writes", async () => {
    const db = await openStore(file, { logger });
    await db.close();

    await expect(db.get("foo")).rejects.toThrow(StoreClosedError);
    await expect(db.put("foo", "bar")).rejects.toThrow(StoreClosedError);
    await expect(db.flush()).resolves.toBeUndefined();
    await expect(db.close()).resolves.toBeUndefined();
  });

  test("unknown options are rejected", async () => {
    const options = { recover: true, maxLogSize: 1024 };

    await expect(openStore(file, options)).rejects.toThrow(InvalidOptionsError);
    await expect(openStore(file, options)).rejects.toThrow(/maxLogSize/);
  });
});
