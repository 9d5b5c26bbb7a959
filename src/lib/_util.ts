import fs from "node:fs";

export function ensureDir(p: string) {
  fs.mkdirSync(p, { recursive: true });
}

/** Cuts to at most `max` characters, marking the cut with a trailing ellipsis. */
export function clampStr(s: unknown, max = 4096): string {
  const v = String(s ?? "");
  return v.length > max ? v.slice(0, max - 1) + "…" : v;
}

export function maskSecret(value: string | undefined, visible = 5): string | null {
  if (!value) return null;
  return value.slice(0, visible) + "...";
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
