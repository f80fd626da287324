import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { z } from "zod";

// package.json sits one level above both src/ and dist/
const PackageJsonSchema = z.object({ version: z.string() });

function readVersion(): string {
  try {
    const file = fileURLToPath(new URL("../package.json", import.meta.url));
    return PackageJsonSchema.parse(JSON.parse(readFileSync(file, "utf8"))).version;
  } catch {
    return "0.0.0-dev";
  }
}

export const version = readVersion();
