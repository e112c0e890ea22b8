import type { Command } from "./args.js";
import type { LogStore } from "./db.js";
import { type TypedValue, ValueType } from "./encoding.js";

export function formatValue(input: TypedValue): string {
  switch (input.type) {
    case ValueType.Text:
      return input.value;
    case ValueType.SignedInteger:
      return input.value.toString();
    case ValueType.Float64:
      return String(input.value);
  }
}

/**
 * Execute one CLI command against an open store, printing through `print`.
 * Resolves to the process exit code.
 */
export async function runCommand(
  store: LogStore,
  command: Command,
  print: (line: string) => void,
): Promise<number> {
  switch (command.name) {
    case "put":
      await store.put(command.key, command.value);
      print("OK");
      return 0;

    case "get": {
      const value = await store.get(command.key);
      if (value === null) {
        print("(nil)");
        return 1;
      }
      print(formatValue(value));
      return 0;
    }

    case "keys":
      for (const key of store.listKeys()) {
        print(formatValue(key));
      }
      return 0;

    case "demo": {
      await store.put("name", "Sai'd");
      await store.put("lang", "TypeScript");

      for (const key of ["name", "lang"]) {
        const value = await store.get(key);
        print(value === null ? "(nil)" : formatValue(value));
      }
      return 0;
    }
  }
}
