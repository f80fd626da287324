/**
 * Environment Variable API Key Store
 *
 * @module credentials/stores/env-store
 */

import { Err, Ok, type Result } from "../../types/result.js";
import {
  type ApiKey,
  type ApiKeyStore,
  type ApiKeyStoreError,
  createStoreError,
  generateMaskedHint,
} from "../types.js";

/** Checked in order */
export const API_KEY_ENV_VARS = ["WEBLATE_API_KEY", "FEDORA_WEBLATE_KEY"] as const;

/**
 * Read-only store over `WEBLATE_API_KEY` and `FEDORA_WEBLATE_KEY`.
 *
 * @example
 * ```typescript
 * const store = new EnvApiKeyStore();
 * const result = await store.get();
 * if (result.ok && result.value) {
 *   console.log("Found:", result.value.maskedHint);
 * }
 * ```
 */
export class EnvApiKeyStore implements ApiKeyStore {
  readonly name = "env" as const;
  readonly priority = 90;
  readonly readOnly = true;

  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  async get(): Promise<Result<ApiKey | null, ApiKeyStoreError>> {
    for (const variable of API_KEY_ENV_VARS) {
      const value = this.env[variable]?.trim();
      if (value) {
        return Ok({
          value,
          source: this.name,
          location: variable,
          maskedHint: generateMaskedHint(value),
        });
      }
    }
    return Ok(null);
  }

  async set(): Promise<Result<ApiKey, ApiKeyStoreError>> {
    return Err(
      createStoreError("READ_ONLY", "Environment variables cannot be modified", this.name)
    );
  }

  async delete(): Promise<Result<boolean, ApiKeyStoreError>> {
    return Err(
      createStoreError("READ_ONLY", "Environment variables cannot be modified", this.name)
    );
  }
}
