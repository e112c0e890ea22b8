import fs from "node:fs/promises";
import { Buffer } from "node:buffer";
import path from "node:path";
import {
  CRC_SIZE,
  RECORD_PREFIX_SIZE,
  type Scalar,
  type TypedValue,
  ValueType,
  decodeHeader,
  decodeRecord,
  encodeRecord,
  recordSize,
  toTypedValue,
} from "./encoding.js";
import { StoreClosedError } from "./errors.js";
import { type LogStoreOptions, resolveOptions } from "./options.js";

export type KeyEntry = {
  key: TypedValue;
  /** Position of the record's checksum field in the log. */
  offset: number;
  /** Whole record: checksum, header and payloads. */
  length: number;
  timestamp: number;
};

export type LogStore = {
  readonly path: string;
  /** Number of live keys. */
  readonly size: number;
  put(key: Scalar | TypedValue, value: Scalar | TypedValue): Promise<void>;
  get(key: Scalar | TypedValue): Promise<TypedValue | null>;
  flush(): Promise<void>;
  close(): Promise<void>;
  listKeys(): TypedValue[];
  fold(callback: (key: TypedValue, value: TypedValue) => void): Promise<void>;
};

/**
 * Directory key for a typed key. Text "25" and integer 25 are different keys.
 */
export function keyId(key: TypedValue): string {
  switch (key.type) {
    case ValueType.Text:
      return `s:${key.value}`;
    case ValueType.SignedInteger:
      return `i:${key.value}`;
    case ValueType.Float64:
      return `f:${Object.is(key.value, -0) ? "-0" : key.value}`;
  }
}

function unixSeconds(): number {
  return Math.floor(Date.now() / 1000);
}

export async function openStore(
  file: string,
  options?: LogStoreOptions,
): Promise<LogStore> {
  const { recover, sync, logger } = resolveOptions(options);

  await fs.mkdir(path.dirname(file), { recursive: true });

  const _handle = await fs.open(file, "a+");

  /**
   * next append offset, always the end of the file
   */
  let _cursor = (await _handle.stat()).size;

  /**
   * mapping of key id to the location of its latest record
   */
  const _keyDir = new Map<string, KeyEntry>();

  let _closed = false;
  let _pending: Promise<unknown> = Promise.resolve();

  if (recover && _cursor > 0) {
    try {
      await _load();
    } catch (error: unknown) {
      await _handle.close();
      throw error;
    }
  }

  logger.debug("opened log", { file, bytes: _cursor, keys: _keyDir.size });

  /**
   * Run store operations one at a time, in call order. A failed task still
   * rejects the promise returned to its caller.
   */
  function _serialize<T>(task: () => Promise<T>): Promise<T> {
    const result = _pending.then(task);
    _pending = result.catch(() => undefined);
    return result;
  }

  function _assertOpen() {
    if (_closed) {
      throw new StoreClosedError(file);
    }
  }

  /**
   * Read up to `length` bytes at `position`; shorter when the file ends first.
   */
  async function _readAt(position: number, length: number): Promise<Buffer> {
    const buffer = Buffer.alloc(length);
    let total = 0;

    while (total < length) {
      const { bytesRead } = await _handle.read(
        buffer,
        total,
        length - total,
        position + total,
      );

      if (bytesRead === 0) {
        break;
      }

      total += bytesRead;
    }

    return buffer.subarray(0, total);
  }

  /**
   * Replay the log against the key directory until EOF or the first record
   * that is truncated or fails its checksum. Bytes after that point stay in
   * the file but are never indexed.
   */
  async function _load() {
    let offset = 0;
    let records = 0;

    while (offset < _cursor) {
      const remaining = _cursor - offset;

      if (remaining < RECORD_PREFIX_SIZE) {
        logger.warn("log ends with a partial header", { file, offset });
        break;
      }

      const prefix = await _readAt(offset, RECORD_PREFIX_SIZE);
      const size = recordSize(decodeHeader(prefix, CRC_SIZE));

      if (remaining < size) {
        logger.warn("log ends with a truncated record", { file, offset, size });
        break;
      }

      const record = decodeRecord(await _readAt(offset, size));

      if (record === null) {
        logger.warn("checksum mismatch, replay stopped", { file, offset });
        break;
      }

      _keyDir.set(keyId(record.key), {
        key: record.key,
        offset,
        length: size,
        timestamp: record.timestamp,
      });

      offset += size;
      records += 1;
    }

    logger.info("replayed log", { file, records, keys: _keyDir.size });
  }

  async function put(key: Scalar | TypedValue, value: Scalar | TypedValue) {
    _assertOpen();

    const typedKey = toTypedValue(key);
    const timestamp = unixSeconds();
    const data = encodeRecord(timestamp, typedKey, value);

    await _serialize(async () => {
      let written = 0;

      try {
        while (written < data.length) {
          const result = await _handle.write(
            data,
            written,
            data.length - written,
          );
          written += result.bytesWritten;
        }
      } catch (error: unknown) {
        // a partial append still moved the end of file
        if (written > 0) {
          try {
            _cursor = (await _handle.stat()).size;
          } catch (statError: unknown) {
            logger.error("could not re-read log size after failed write", {
              file,
              error: String(statError),
            });
          }
        }
        throw error;
      }

      if (sync) {
        await _handle.sync();
      }

      // index only once the bytes are in the file
      _keyDir.set(keyId(typedKey), {
        key: typedKey,
        offset: _cursor,
        length: data.length,
        timestamp,
      });

      _cursor += data.length;
    });
  }

  async function get(key: Scalar | TypedValue): Promise<TypedValue | null> {
    _assertOpen();

    const id = keyId(toTypedValue(key));

    // looked up in the queue so earlier un-awaited puts are visible
    return _serialize(async () => {
      const keyEntry = _keyDir.get(id);

      if (keyEntry === undefined) {
        return null;
      }

      const buffer = await _readAt(keyEntry.offset, keyEntry.length);

      if (buffer.length < keyEntry.length) {
        logger.debug("truncated read", {
          file,
          offset: keyEntry.offset,
          expected: keyEntry.length,
          actual: buffer.length,
        });
        return null;
      }

      const record = decodeRecord(buffer);

      if (record === null) {
        logger.debug("checksum mismatch", { file, offset: keyEntry.offset });
        return null;
      }

      return record.value;
    });
  }

  async function flush(): Promise<void> {
    if (_closed) {
      return;
    }

    await _serialize(() => _handle.sync());
  }

  function listKeys(): TypedValue[] {
    return [..._keyDir.values()].map((entry) => entry.key);
  }

  async function fold(
    callback: (key: TypedValue, value: TypedValue) => void,
  ): Promise<void> {
    _assertOpen();

    await _serialize(async () => {
      for (const keyEntry of [..._keyDir.values()]) {
        const buffer = await _readAt(keyEntry.offset, keyEntry.length);
        const record =
          buffer.length === keyEntry.length ? decodeRecord(buffer) : null;

        if (record === null) {
          logger.warn("skipping unreadable record", {
            file,
            offset: keyEntry.offset,
          });
          continue;
        }

        callback(keyEntry.key, record.value);
      }
    });
  }

  async function close(): Promise<void> {
    if (_closed) {
      return;
    }

    _closed = true;

    await _serialize(async () => {
      try {
        await _handle.sync();
      } finally {
        await _handle.close();
      }
    });
  }

  return {
    path: file,
    get size() {
      return _keyDir.size;
    },
    put,
    get,
    flush,
    close,
    listKeys,
    fold,
  };
}
