import { MalformedUpstreamPayload, isRecord } from "@fis-bap/shared";

export interface MissingPath {
  path: string;
}

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

function joinPath(prefix: string, path: string): string {
  if (prefix === "") return path;
  if (path === "") return prefix;
  return path.startsWith("[") ? `${prefix}${path}` : `${prefix}.${path}`;
}

/** "a.b[0].c" -> ["a", "b", 0, "c"] */
function segments(path: string): (string | number)[] {
  const parts: (string | number)[] = [];
  for (const match of path.matchAll(/([^.[\]]+)|\[(\d+)\]/g)) {
    const [, key, index] = match;
    if (index !== undefined) parts.push(parseInt(index, 10));
    else if (key !== undefined) parts.push(key);
  }
  return parts;
}

function resolve(root: unknown, path: string): unknown {
  let current = root;
  for (const segment of segments(path)) {
    if (typeof segment === "number") {
      if (!Array.isArray(current)) return undefined;
      current = current[segment];
    } else {
      if (!isRecord(current)) return undefined;
      current = current[segment];
    }
  }
  return current;
}

/**
 * Typed access into a stored seller payload.
 *
 * Every lookup reports the full path it was asked for, so a failure deep in
 * an `on_init` order names the exact field (`message.order.payments[0].id`)
 * instead of surfacing as a generic undefined access.
 */
export class PayloadReader {
  private constructor(
    private readonly root: unknown,
    private readonly prefix: string,
    private readonly stage: string | undefined,
  ) {}

  static of(payload: unknown, stage?: string): PayloadReader {
    return new PayloadReader(payload, "", stage);
  }

  /** Full path of a field below this reader. */
  pathOf(path: string): string {
    return joinPath(this.prefix, path);
  }

  at(path: string): Result<unknown, MissingPath> {
    const value = resolve(this.root, path);
    if (value === undefined || value === null) {
      return { ok: false, error: { path: this.pathOf(path) } };
    }
    return { ok: true, value };
  }

  /** Strings and numbers both read as strings; sellers mix the two for amounts. */
  string(path: string): Result<string, MissingPath> {
    const found = this.at(path);
    if (!found.ok) return found;
    if (typeof found.value === "string" && found.value !== "") {
      return { ok: true, value: found.value };
    }
    if (typeof found.value === "number" && Number.isFinite(found.value)) {
      return { ok: true, value: String(found.value) };
    }
    return { ok: false, error: { path: this.pathOf(path) } };
  }

  array(path: string): Result<unknown[], MissingPath> {
    const found = this.at(path);
    if (!found.ok) return found;
    if (!Array.isArray(found.value)) {
      return { ok: false, error: { path: this.pathOf(path) } };
    }
    return { ok: true, value: found.value };
  }

  child(path: string): PayloadReader {
    return new PayloadReader(resolve(this.root, path), this.pathOf(path), this.stage);
  }

  has(path: string): boolean {
    return this.at(path).ok;
  }

  /** One reader per element; empty when the path is not an array. */
  each(path: string): PayloadReader[] {
    const found = this.array(path);
    if (!found.ok) return [];
    const base = this.pathOf(path);
    return found.value.map(
      (element, index) => new PayloadReader(element, `${base}[${index}]`, this.stage),
    );
  }

  requireString(path: string): string {
    return this.unwrap(this.string(path));
  }

  optionalString(path: string): string | undefined {
    const found = this.string(path);
    return found.ok ? found.value : undefined;
  }

  /** Non-empty array, or a MalformedUpstreamPayload naming the path. */
  requireEach(path: string): PayloadReader[] {
    const readers = this.each(path);
    if (readers.length === 0) {
      throw new MalformedUpstreamPayload(this.pathOf(path), this.stage);
    }
    return readers;
  }

  /** The first element of a non-empty array. */
  requireFirst(path: string): PayloadReader {
    const [first] = this.requireEach(path);
    if (first === undefined) {
      throw new MalformedUpstreamPayload(this.pathOf(path), this.stage);
    }
    return first;
  }

  private unwrap<T>(result: Result<T, MissingPath>): T {
    if (!result.ok) {
      throw new MalformedUpstreamPayload(result.error.path, this.stage);
    }
    return result.value;
  }
}
