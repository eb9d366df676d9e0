import { randomUUID } from "crypto";

/** 12 hex characters; row ids never change once written. */
export function genId(): string {
  return randomUUID().replace(/-/g, "").slice(0, 12);
}
