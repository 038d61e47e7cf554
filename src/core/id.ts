import { createHash } from "node:crypto";

export function stableId(parts: Array<string | number | undefined>): string {
  const hash = createHash("sha1");
  hash.update(parts.map((part) => (part === undefined ? "" : String(part))).join("::"));
  return hash.digest("hex").slice(0, 12);
}
