import {
  assertUniqueEndpointIds,
  type Catalog,
  type CatalogStore,
  catalogSchema,
  emptyCatalog,
  formatZodIssues,
  getErrorMessage,
  InvalidCatalogError,
} from "@svcsync/core";
import { mkdir, readFile, rename, rm, writeFile } from "fs/promises";
import { homedir } from "os";
import { dirname, join } from "path";
import { log } from "./log";

/** Directory for CLI configuration (e.g., ~/.svcsync/) */
const CONFIG_DIRNAME = ".svcsync";
const CONFIG_FILENAME = "config.json";
const CONFIG_HOME_ENV = "SVCSYNC_HOME";

export function getConfigPath() {
  return join(getConfigDir(), CONFIG_FILENAME);
}

export function getConfigDir() {
  const customDir = process.env[CONFIG_HOME_ENV];
  if (customDir && customDir.trim().length > 0) {
    return customDir;
  }
  return join(homedir(), CONFIG_DIRNAME);
}

/**
 * Catalog kept in one JSON file, rewritten as a whole on every save.
 * A missing file reads as the empty catalog.
 */
export class FileCatalogStore implements CatalogStore {
  readonly path: string;

  constructor(path: string = getConfigPath()) {
    this.path = path;
  }

  async load(): Promise<Catalog> {
    log.debug(`Loading catalog from ${this.path}`);

    let raw: string;
    try {
      raw = await readFile(this.path, "utf8");
    } catch (error: unknown) {
      if (isNodeError(error) && error.code === "ENOENT") {
        log.debug("Catalog file not found, starting empty");
        return emptyCatalog();
      }
      throw error;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new InvalidCatalogError(
        `Failed to parse ${this.path}: ${getErrorMessage(error)}`,
        { cause: error }
      );
    }

    const result = catalogSchema.safeParse(parsed);
    if (!result.success) {
      throw new InvalidCatalogError(
        `Invalid catalog in ${this.path}: ${formatZodIssues(result.error)}`
      );
    }
    return result.data;
  }

  async save(catalog: Catalog): Promise<void> {
    assertUniqueEndpointIds(catalog);

    log.debug(`Saving catalog to ${this.path}`);
    await mkdir(dirname(this.path), { recursive: true });

    // Written beside the target, then moved over it.
    const staging = `${this.path}.tmp`;
    try {
      await writeFile(staging, `${JSON.stringify(catalog, null, 2)}\n`, "utf8");
      await rename(staging, this.path);
    } catch (error) {
      await rm(staging, { force: true });
      throw error;
    }
  }
}

type NodeError = Error & { code?: string };

function isNodeError(error: unknown): error is NodeError {
  return error instanceof Error && "code" in error && typeof error.code === "string";
}
