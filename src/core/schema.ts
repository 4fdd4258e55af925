import { z } from "zod";
import { MalformedPayloadError } from "./errors.js";

// Missing or null string fields decode to "" rather than failing.
export const str = z.string().nullish().transform((v) => v ?? "");

export const int = z.number().int().nullish().transform((v) => v ?? 0);

export function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

// A key counts as present when it holds anything but null/undefined.
export function has(raw: Record<string, unknown>, key: string): boolean {
  return raw[key] !== undefined && raw[key] !== null;
}

export function parseStrict<S extends z.ZodTypeAny>(schema: S, raw: unknown, what: string): z.output<S> {
  const r = schema.safeParse(raw);
  if (!r.success) throw MalformedPayloadError.fromZod(what, r.error);
  return r.data;
}

export function requireRecord(raw: unknown, what: string): Record<string, unknown> {
  if (!isRecord(raw)) {
    const shape = Array.isArray(raw) ? "array" : raw === null ? "null" : typeof raw;
    throw new MalformedPayloadError(what, `expected object, got ${shape}`);
  }
  return raw;
}
