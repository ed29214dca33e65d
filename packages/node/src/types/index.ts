/**
 * Type barrel — re-exports all public types from @timevault/node.
 */

// DTOs
export {
  AmountSchema,
  PaginationQuerySchema,
  CreateLockSchema,
  ExtendLockSchema,
  ListLocksQuerySchema,
  SetFeesSchema,
  SetFeeExemptionSchema,
  TransferAdministrationSchema,
  ListEventsQuerySchema,
  ListStreamEventsQuerySchema,
  RegisterAssetTypeSchema,
  MintUnitSchema,
  AssociateAccountSchema,
  CreditSchema,
} from "./dto.js";
export type {
  CreateLockDto,
  ExtendLockDto,
  ListLocksQuery,
  SetFeesDto,
  SetFeeExemptionDto,
  TransferAdministrationDto,
  ListEventsQuery,
  ListStreamEventsQuery,
  RegisterAssetTypeDto,
  MintUnitDto,
  AssociateAccountDto,
  CreditDto,
} from "./dto.js";

// Views
export {
  toLockView,
  toCreateLockView,
  toExtendLockView,
  toWithdrawView,
  toConfigView,
} from "./views.js";
export type { LockView } from "./views.js";

// Error
export { createErrorEnvelope } from "./error.js";
export type {
  ApiErrorCode,
  ErrorStatus,
  ErrorDetail,
  ErrorEnvelope,
} from "./error.js";

// Pagination
export { encodeCursor, decodeCursor, paginate } from "./pagination.js";
export type {
  CursorKey,
  PaginationQuery,
  PaginationMeta,
  PaginatedResponse,
} from "./pagination.js";

// Auth
export { ROLE_PERMISSIONS, hasPermission } from "./auth.js";
export type {
  Role,
  Permission,
  AuthContext,
  ApiKeyRecord,
  JwtClaims,
} from "./auth.js";

// App env
export type { AppEnv } from "./api-contract.js";
