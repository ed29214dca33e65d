/**
 * Request DTOs with Zod validation schemas.
 *
 * Each DTO has a Zod schema and a derived TypeScript type.
 * Route handlers use these for body/query validation. Identifier and
 * duration rules are enforced by the custody package; these schemas
 * only check shape.
 */

import { z } from "zod";

// =============================================================================
// Shared Schemas
// =============================================================================

/** Decimal string or safe integer, parsed to bigint */
export const AmountSchema = z
  .union([
    z.string().regex(/^\d+$/, "must be a non-negative integer"),
    z.number().int().nonnegative(),
  ])
  .transform((v) => BigInt(v));

export const PaginationQuerySchema = z.object({
  cursor: z.string().optional(),
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

const BooleanQuerySchema = z
  .enum(["true", "false"])
  .transform((v) => v === "true");

// =============================================================================
// Lock DTOs
// =============================================================================

export const CreateLockSchema = z.object({
  assetType: z.string().min(1),
  unitId: z.number().int().positive(),
  beneficiary: z.string().min(1),
  duration: z.number().int(),
});

export type CreateLockDto = z.infer<typeof CreateLockSchema>;

export const ExtendLockSchema = z.object({
  extraDuration: z.number().int(),
});

export type ExtendLockDto = z.infer<typeof ExtendLockSchema>;

export const ListLocksQuerySchema = PaginationQuerySchema.extend({
  assetType: z.string().min(1).optional(),
  creator: z.string().min(1).optional(),
  beneficiary: z.string().min(1).optional(),
  unlocked: BooleanQuerySchema.optional(),
});

export type ListLocksQuery = z.infer<typeof ListLocksQuerySchema>;

// =============================================================================
// Admin DTOs
// =============================================================================

export const SetFeesSchema = z.object({
  creationFee: AmountSchema,
  extensionFee: AmountSchema,
});

export type SetFeesDto = z.infer<typeof SetFeesSchema>;

export const SetFeeExemptionSchema = z.object({
  exempt: z.boolean(),
});

export type SetFeeExemptionDto = z.infer<typeof SetFeeExemptionSchema>;

export const TransferAdministrationSchema = z.object({
  account: z.string().min(1),
});

export type TransferAdministrationDto = z.infer<
  typeof TransferAdministrationSchema
>;

// =============================================================================
// Event DTOs
// =============================================================================

export const ListEventsQuerySchema = PaginationQuerySchema.extend({
  afterPosition: z.coerce.number().int().min(0).optional(),
});

export type ListEventsQuery = z.infer<typeof ListEventsQuerySchema>;

export const ListStreamEventsQuerySchema = PaginationQuerySchema.extend({
  afterVersion: z.coerce.number().int().min(0).optional(),
});

export type ListStreamEventsQuery = z.infer<typeof ListStreamEventsQuerySchema>;

// =============================================================================
// Sandbox DTOs
// =============================================================================

export const RegisterAssetTypeSchema = z.object({
  assetType: z.string().min(1),
  kind: z.enum(["non-fungible", "fungible"]).optional(),
  feeSchedule: z
    .object({
      fixed: z.number().int().nonnegative().optional(),
      fractional: z.number().int().nonnegative().optional(),
      royalty: z.number().int().nonnegative().optional(),
    })
    .optional(),
});

export type RegisterAssetTypeDto = z.infer<typeof RegisterAssetTypeSchema>;

export const MintUnitSchema = z.object({
  unitId: z.number().int().positive(),
  owner: z.string().min(1),
});

export type MintUnitDto = z.infer<typeof MintUnitSchema>;

export const AssociateAccountSchema = z.object({
  assetType: z.string().min(1),
});

export type AssociateAccountDto = z.infer<typeof AssociateAccountSchema>;

export const CreditSchema = z.object({
  amount: AmountSchema,
});

export type CreditDto = z.infer<typeof CreditSchema>;
