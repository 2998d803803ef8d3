import {
  AmbiguousPropertyStructureError,
  DuplicatedPropertyError,
  PropertySyntaxError,
} from "../errors";
import { isPlainObject, type JsonObject } from "./hash";

/**
 * Parses `a.b.c=value` lines into a nested record.
 *
 * - Blank lines are skipped; keys and values are trimmed.
 * - `\.` inside a key is a literal dot.
 * - Empty path segments, a missing `=`, a repeated path, or a path that
 *   turns a value into a branch (or the reverse) are errors.
 */
export function parseDotProperties(content: string): JsonObject {
  const data: JsonObject = {};

  for (const rawLine of content.split(/\r\n|\r|\n/)) {
    const line = rawLine.trim();
    if (!line) {
      continue;
    }

    const separator = line.indexOf("=");
    if (separator < 0) {
      throw new PropertySyntaxError(line);
    }

    const key = line.slice(0, separator).trim();
    const value = line.slice(separator + 1).trim();
    assign(data, key, parseKey(key), value);
  }

  return data;
}

function parseKey(key: string): string[] {
  const path: string[] = [];
  let segment = "";

  for (let i = 0; i < key.length; i++) {
    const ch = key[i];
    if (ch === "\\" && key[i + 1] === ".") {
      segment += ".";
      i++;
      continue;
    }
    if (ch === ".") {
      if (!segment) {
        throw new PropertySyntaxError(key);
      }
      path.push(segment);
      segment = "";
      continue;
    }
    segment += ch;
  }

  if (!segment) {
    throw new PropertySyntaxError(key);
  }
  path.push(segment);
  return path;
}

function assign(data: JsonObject, key: string, path: string[], value: string) {
  let node = data;

  path.forEach((name, depth) => {
    const walked = path.slice(0, depth + 1).join(".");
    const existing = Object.hasOwn(node, name) ? node[name] : undefined;

    if (depth === path.length - 1) {
      if (existing === undefined) {
        define(node, name, value);
        return;
      }
      if (typeof existing === "string") {
        throw new DuplicatedPropertyError(key);
      }
      throw new AmbiguousPropertyStructureError(key, walked);
    }

    if (existing === undefined) {
      const child: JsonObject = {};
      define(node, name, child);
      node = child;
      return;
    }
    if (!isPlainObject(existing)) {
      throw new AmbiguousPropertyStructureError(key, walked);
    }
    node = existing;
  });
}

// Keys such as `__proto__` or `constructor` are plain data here.
function define(node: JsonObject, name: string, value: unknown) {
  Object.defineProperty(node, name, {
    value,
    enumerable: true,
    writable: true,
    configurable: true,
  });
}
