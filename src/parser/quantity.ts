import type { ByteUnit, Quantity } from "../types/config.js";

const UNIT_BYTES: Record<ByteUnit, number> = {
  B: 1,
  KiB: 1024,
  MiB: 1024 ** 2,
  GiB: 1024 ** 3,
  TiB: 1024 ** 4,
  PiB: 1024 ** 5,
  kB: 1000,
  KB: 1000,
  MB: 1000 ** 2,
  GB: 1000 ** 3,
  TB: 1000 ** 4,
  PB: 1000 ** 5,
};

const QUANTITY_SHAPE = /^(\d+(?:\.\d+)?)\s+([A-Za-z]+)$/;

/** Unit tokens that claim to be byte sizes; anything else is ordinary text. */
const BYTE_UNIT_SHAPE = /^[A-Za-z]?i?B$/;

function isByteUnit(token: string): token is ByteUnit {
  return Object.prototype.hasOwnProperty.call(UNIT_BYTES, token);
}

export type QuantityMatch =
  | { readonly kind: "quantity"; readonly quantity: Quantity }
  | { readonly kind: "bad-unit"; readonly unit: string }
  | { readonly kind: "not-a-quantity" };

/**
 * Classify `text` as a size literal (`<number> <unit>`). A unit token shaped
 * like a byte unit but not among the known ones is reported as `bad-unit`.
 */
export function matchQuantity(text: string): QuantityMatch {
  const m = QUANTITY_SHAPE.exec(text.trim());
  if (!m) return { kind: "not-a-quantity" };
  const [, amount, unit] = m;
  if (amount === undefined || unit === undefined) return { kind: "not-a-quantity" };
  if (isByteUnit(unit)) return { kind: "quantity", quantity: makeQuantity(Number(amount), unit) };
  if (BYTE_UNIT_SHAPE.test(unit)) return { kind: "bad-unit", unit };
  return { kind: "not-a-quantity" };
}

/** Parse a size literal, or `undefined` when `text` is not one. */
export function parseQuantity(text: string): Quantity | undefined {
  const match = matchQuantity(text);
  return match.kind === "quantity" ? match.quantity : undefined;
}

export function makeQuantity(value: number, unit: ByteUnit): Quantity {
  const quantity: Quantity = { kind: "quantity", value, unit, bytes: Math.round(value * UNIT_BYTES[unit]) };
  return Object.freeze(quantity);
}

export function formatQuantity(q: Quantity): string {
  return `${q.value} ${q.unit}`;
}

export function compareQuantities(a: Quantity, b: Quantity): number {
  return a.bytes - b.bytes;
}
