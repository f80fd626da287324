import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { FileApiKeyStore } from "../stores/file-store.js";

describe("FileApiKeyStore", () => {
  let tempDir: string;
  let keyFile: string;
  let store: FileApiKeyStore;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "fedora-l10n-key-test-"));
    keyFile = path.join(tempDir, "fedora-l10n", "api-key");
    store = new FileApiKeyStore(keyFile);
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it("returns null when the file does not exist", async () => {
    expect(await store.get()).toEqual({ ok: true, value: null });
  });

  it("saves a trimmed key readable only by the owner", async () => {
    const result = await store.set("  test-secret-value \n");

    expect(result.ok && result.value.value).toBe("test-secret-value");
    expect(fs.readFileSync(keyFile, "utf-8")).toBe("test-secret-value\n");
    expect(fs.statSync(keyFile).mode & 0o777).toBe(0o600);
  });

  it("tightens the mode of an existing file", async () => {
    fs.mkdirSync(path.dirname(keyFile), { recursive: true });
    fs.writeFileSync(keyFile, "old", { mode: 0o644 });

    await store.set("test-secret");

    expect(fs.statSync(keyFile).mode & 0o777).toBe(0o600);
  });

  it("reads the key back", async () => {
    await store.set("test-secret-value");

    const result = await store.get();

    expect(result).toEqual({
      ok: true,
      value: {
        value: "test-secret-value",
        source: "file",
        location: keyFile,
        maskedHint: "tes...lue",
      },
    });
  });

  it("rejects empty keys and keys with whitespace", async () => {
    const empty = await store.set("   ");
    const spaced = await store.set("two words");

    expect(empty.ok || empty.error.code).toBe("INVALID_KEY");
    expect(spaced.ok || spaced.error.code).toBe("INVALID_KEY");
    expect(fs.existsSync(keyFile)).toBe(false);
  });

  it("deletes the file", async () => {
    await store.set("test-secret");

    expect(await store.delete()).toEqual({ ok: true, value: true });
    expect(await store.delete()).toEqual({ ok: true, value: false });
  });
});
