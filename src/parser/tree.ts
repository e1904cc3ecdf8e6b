import { DefectDataError } from "../errors/parser.errors.js";

export type JsonObject = Record<string, unknown>;

export function isPlainObject(value: unknown): value is JsonObject {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

export function findChild(node: unknown, key: string): unknown {
  if (!isPlainObject(node)) return undefined;
  return Object.prototype.hasOwnProperty.call(node, key) ? node[key] : undefined;
}

export function findObject(node: unknown, key: string): JsonObject | null {
  const child = findChild(node, key);
  return isPlainObject(child) ? child : null;
}

export function findArray(node: unknown, key: string): readonly unknown[] | null {
  const child = findChild(node, key);
  return Array.isArray(child) ? child : null;
}

export function readString(node: unknown, key: string, fallback: string): string {
  const value = findChild(node, key);
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  return fallback;
}

export function readInt(node: unknown, key: string, fallback: number): number {
  const value = findChild(node, key);
  if (typeof value === "number" && Number.isInteger(value)) return value;
  if (typeof value === "string" && /^\s*[+-]?\d+\s*$/.test(value)) {
    return Number.parseInt(value, 10);
  }
  return fallback;
}

export function readBool(node: unknown, key: string, fallback: boolean): boolean {
  const value = findChild(node, key);
  if (typeof value === "boolean") return value;
  if (value === "true") return true;
  if (value === "false") return false;
  return fallback;
}

/** Reads a mandatory, non-empty string. */
export function requireString(node: unknown, key: string): string {
  const value = readString(node, key, "");
  if (!value) {
    throw new DefectDataError(`missing "${key}"`);
  }
  return value;
}

export function requireArray(node: unknown, key: string): readonly unknown[] {
  const value = findArray(node, key);
  if (!value) {
    throw new DefectDataError(`missing "${key}" array`);
  }
  return value;
}

/**
 * Iteration state over the nodes a decoder reads. The decoder owns the cursor;
 * the nodes themselves are never modified.
 */
export class NodeCursor<T = unknown> {
  private index = 0;

  constructor(private readonly nodes: readonly T[] = []) {}

  /**
   * Returns the current node and moves past it, or undefined once exhausted.
   * Parsed JSON never holds undefined, so a null element is still a node.
   */
  next(): T | undefined {
    if (this.index >= this.nodes.length) return undefined;
    const node = this.nodes[this.index];
    this.index += 1;
    return node;
  }
}
