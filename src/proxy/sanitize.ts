const UNSAFE = /[^\t\n\r\x20-\x7e]/g;

export function sanitizeResponseText(text: string | null | undefined): string {
  if (text == null || text === "") return "{}";
  return text.replace(UNSAFE, "");
}

export function isJsonText(text: string): boolean {
  try {
    JSON.parse(text);
    return true;
  } catch {
    return false;
  }
}
