import { createHash } from "crypto";

/** MD5 hash of a UTF-8 string as 32-char hex (Gravatar keys). */
export function md5Hex(value: string): string {
  return createHash("md5").update(value, "utf8").digest("hex");
}
