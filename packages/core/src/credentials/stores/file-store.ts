/**
 * Key File Store
 *
 * Plain-text key in `~/.config/fedora-l10n/api-key`, owner-readable only.
 *
 * @module credentials/stores/file-store
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { Err, Ok, type Result } from "../../types/result.js";
import {
  type ApiKey,
  type ApiKeyStore,
  type ApiKeyStoreError,
  createStoreError,
  generateMaskedHint,
  normalizeApiKey,
} from "../types.js";

/** rw for the owner only */
export const KEY_FILE_MODE = 0o600;

function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}

export class FileApiKeyStore implements ApiKeyStore {
  readonly name = "file" as const;
  readonly priority = 50;
  readonly readOnly = false;

  constructor(readonly filePath: string) {}

  async get(): Promise<Result<ApiKey | null, ApiKeyStoreError>> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, "utf-8");
    } catch (error) {
      if (isNodeError(error) && error.code === "ENOENT") {
        return Ok(null);
      }
      return Err(
        createStoreError("IO_ERROR", `Failed to read ${this.filePath}`, this.name, error)
      );
    }

    const value = normalizeApiKey(raw);
    return Ok(value === null ? null : this.toApiKey(value));
  }

  async set(value: string): Promise<Result<ApiKey, ApiKeyStoreError>> {
    const key = normalizeApiKey(value);
    if (key === null) {
      return Err(createStoreError("INVALID_KEY", "API key must be a single non-empty token", this.name));
    }

    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true, mode: 0o700 });
      await fs.writeFile(this.filePath, `${key}\n`, { encoding: "utf-8", mode: KEY_FILE_MODE });
      // writeFile only applies the mode when it creates the file
      await fs.chmod(this.filePath, KEY_FILE_MODE);
    } catch (error) {
      return Err(
        createStoreError("IO_ERROR", `Failed to write ${this.filePath}`, this.name, error)
      );
    }
    return Ok(this.toApiKey(key));
  }

  async delete(): Promise<Result<boolean, ApiKeyStoreError>> {
    try {
      await fs.unlink(this.filePath);
      return Ok(true);
    } catch (error) {
      if (isNodeError(error) && error.code === "ENOENT") {
        return Ok(false);
      }
      return Err(
        createStoreError("IO_ERROR", `Failed to delete ${this.filePath}`, this.name, error)
      );
    }
  }

  private toApiKey(value: string): ApiKey {
    return {
      value,
      source: this.name,
      location: this.filePath,
      maskedHint: generateMaskedHint(value),
    };
  }
}
