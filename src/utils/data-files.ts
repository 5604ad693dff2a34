import { existsSync } from "fs";
import path from "path";
import { fileURLToPath } from "url";

const __dirname = path.dirname(fileURLToPath(import.meta.url));

/** Locate a file under data/, from sources (src/utils) or the build (dist/src/utils) */
export function dataFilePath(name: string): string {
  const candidates = [
    path.resolve(__dirname, "../../data", name),
    path.resolve(__dirname, "../../../data", name),
  ];
  return candidates.find((candidate) => existsSync(candidate)) ?? candidates[0];
}
