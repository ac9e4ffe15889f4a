export type EntityKind = "item" | "property";

export type PropertyDatatype =
  | "string"
  | "url"
  | "quantity"
  | "wikibase-item"
  | "wikibase-property";

export const PROPERTY_DATATYPES = [
  "string",
  "url",
  "quantity",
  "wikibase-item",
  "wikibase-property",
] as const satisfies readonly PropertyDatatype[];

/** Language tag to text. */
export type LanguageMap = Record<string, string>;

export type ClaimValue =
  | { type: "string"; value: string }
  | { type: "url"; value: string }
  | { type: "entity"; id: string }
  /** `amount` is a signed decimal such as `+12` or `-0.5`. */
  | { type: "quantity"; amount: string; unit: string };

export interface Claim {
  property: string;
  value: ClaimValue;
}

export interface TargetEntity {
  subject: string;
  kind: EntityKind;
  labels: LanguageMap;
  descriptions: LanguageMap;
  datatype?: PropertyDatatype;
  claims: Claim[];
}

/** Wikibase identifiers carry their kind in the prefix: `P12` or `Q34`. */
export function entityKindOf(id: string): EntityKind {
  return id.startsWith("P") ? "property" : "item";
}

export function isEntityDatatype(
  datatype: PropertyDatatype,
): datatype is "wikibase-item" | "wikibase-property" {
  return datatype === "wikibase-item" || datatype === "wikibase-property";
}

/** Identifiers a claim refers to: its property and, for entity values, the value. */
export function claimReferences(claim: Claim): string[] {
  return claim.value.type === "entity"
    ? [claim.property, claim.value.id]
    : [claim.property];
}

const DECIMAL = /^([+-]?)(\d+(?:\.\d*)?|\.\d+)(?:[eE]([+-]?\d+))?$/;
const MAX_EXPONENT = 1000;

/**
 * Rewrites a numeric literal as the signed plain decimal Wikibase expects
 * for quantity amounts, digit for digit. Undefined when it is not a number.
 */
export function decimalAmount(literal: string): string | undefined {
  const match = DECIMAL.exec(literal.trim());
  if (!match) return undefined;
  const [, sign, mantissa, exponentText = "0"] = match;
  const exponent = Number(exponentText);
  if (Math.abs(exponent) > MAX_EXPONENT) return undefined;

  const [whole, fraction = ""] = mantissa.split(".");
  const digits = whole + fraction;
  const point = whole.length + exponent;
  const plain = point <= 0
    ? `0.${"0".repeat(-point)}${digits}`
    : point >= digits.length
    ? digits + "0".repeat(point - digits.length)
    : `${digits.slice(0, point)}.${digits.slice(point)}`;

  const [integer, decimals = ""] = plain.split(".");
  const trimmedInteger = integer.replace(/^0+(?=\d)/, "");
  const trimmedDecimals = decimals.replace(/0+$/, "");
  const amount = trimmedDecimals
    ? `${trimmedInteger}.${trimmedDecimals}`
    : trimmedInteger;
  return `${sign === "-" && /[1-9]/.test(amount) ? "-" : "+"}${amount}`;
}
