import fs from "fs";
import path from "path";
import * as dotenv from "dotenv";

// Earlier files win: dotenv never overrides a variable that is already set.
export const ENV_FILES = [".env.local", ".env"];

export function loadEnvFiles(root = process.cwd()): string[] {
  const loaded: string[] = [];
  for (const file of ENV_FILES) {
    const full = path.join(root, file);
    if (fs.existsSync(full)) {
      dotenv.config({ path: full });
      loaded.push(full);
    }
  }
  return loaded;
}

loadEnvFiles();
