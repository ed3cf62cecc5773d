import { createHash } from "node:crypto";

/** SHA256 hex digest of a string/buffer. */
export function computeSha256FromContent(content: string | Buffer): string {
  return createHash("sha256").update(content).digest("hex");
}

/** Stable short name for staged content: the first 16 hex digits of its SHA256. */
export function contentName(content: string | Buffer, ext: string): string {
  return `${computeSha256FromContent(content).slice(0, 16)}${ext.toLowerCase()}`;
}
