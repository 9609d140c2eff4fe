import type { HeaderBag } from "./headers.ts";
import { headerValue } from "./headers.ts";

export const REJECT_STATUS = 403;
export const REJECT_BODY = "Unsupported client";

export type Admission = "allow" | "deny";

export function admit(headers: HeaderBag, marker: string): Admission {
  const ua = headerValue(headers, "user-agent");
  if (ua && ua.includes(marker)) return "allow";
  return "deny";
}
