/**
 * Value Types
 *
 * Opaque identifiers used across Timevault.
 *
 * Rules:
 * - Identifiers are branded so a raw string cannot be passed where an
 *   AccountId or AssetTypeId is expected without going through a guard
 * - Zero and negative unit ids are reserved ("no lock") and never valid
 * - Identifiers never contain whitespace or "/" (they appear in URL paths
 *   and event stream ids)
 */

declare const brand: unique symbol;

type Brand<T, B extends string> = T & { readonly [brand]: B };

/**
 * An account that can own asset units, pay fees or administer custody
 * (e.g., "0.0.1001", "alice").
 */
export type AccountId = Brand<string, "AccountId">;

/**
 * Identifier of an asset collection (e.g., "0.0.48213", "genesis-pass").
 */
export type AssetTypeId = Brand<string, "AssetTypeId">;

/**
 * Serial number of a single unit within an asset collection.
 * Always a positive safe integer.
 */
export type UnitId = Brand<number, "UnitId">;

/**
 * Maximum identifier length, shared by accounts and asset types.
 */
export const MAX_IDENTIFIER_LENGTH = 128;

const IDENTIFIER_PATTERN = /^[^\s/]+$/;

function isIdentifier(value: unknown): value is string {
  return (
    typeof value === "string" &&
    value.length > 0 &&
    value.length <= MAX_IDENTIFIER_LENGTH &&
    IDENTIFIER_PATTERN.test(value)
  );
}

export function isAccountId(value: unknown): value is AccountId {
  return isIdentifier(value);
}

export function isAssetTypeId(value: unknown): value is AssetTypeId {
  return isIdentifier(value);
}

export function isUnitId(value: unknown): value is UnitId {
  return typeof value === "number" && Number.isSafeInteger(value) && value > 0;
}
