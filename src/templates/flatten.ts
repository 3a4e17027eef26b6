// ---------- types ----------

export type ConfigScalar = string | number | bigint | boolean | null;

export type ConfigValue = ConfigScalar | ConfigValue[] | ConfigDocument;

export interface ConfigDocument {
  [key: string]: ConfigValue;
}

/** Dotted key path → text to insert for `{{path}}`. */
export type FlatMapping = Record<string, string>;

// ---------- helpers ----------

export function isConfigDocument(value: unknown): value is ConfigDocument {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function joinPath(prefix: string, key: string): string {
  return prefix ? `${prefix}.${key}` : key;
}

/** Leaf coercion: strings verbatim, everything else through String(). */
export function coerceScalar(value: ConfigScalar): string {
  return typeof value === "string" ? value : String(value);
}

// ---------- public ----------

/**
 * Flatten a nested config document into dot-notation keys.
 * e.g. { brand: { primary: "#fff" } } → { "brand.primary": "#fff" }
 *
 * Arrays are branches indexed by position (`team.0.name`). Empty mappings and
 * empty arrays contribute no keys.
 */
export function flatten(document: ConfigDocument, prefix = ""): FlatMapping {
  // no prototype, so a `__proto__` key is stored like any other
  const result: FlatMapping = Object.create(null);

  const visit = (value: ConfigValue, path: string): void => {
    if (Array.isArray(value)) {
      value.forEach((item, index) => visit(item, joinPath(path, String(index))));
    } else if (isConfigDocument(value)) {
      for (const [key, child] of Object.entries(value)) {
        visit(child, joinPath(path, key));
      }
    } else {
      result[path] = coerceScalar(value);
    }
  };

  for (const [key, value] of Object.entries(document)) {
    visit(value, joinPath(prefix, key));
  }
  return result;
}
