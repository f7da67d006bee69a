export type SettlementErrorCategory = "validation" | "authorization" | "state_conflict" | "external";

const errorCategories = {
  ZeroAmount: "validation",
  ZeroAddress: "validation",
  FeeTooLow: "validation",
  NewFeeTooLow: "validation",
  InvalidFeeBps: "validation",
  FeeBpsExceedsThreshold: "validation",
  DestinationChainIdNotSupported: "validation",
  TokenNotSupported: "validation",
  TokenMappingAlreadyExists: "state_conflict",
  InvalidTokenOrRecipient: "validation",
  SourceChainIdShouldBeDifferentFromDestination: "validation",
  SourceChainIdMismatch: "validation",
  SwapRequestParametersMismatch: "validation",
  SwapRequestNotFound: "validation",
  UnknownValidator: "validation",
  UnknownImplementation: "validation",
  UpgradeTimeMustRespectDelay: "validation",
  UpgradeDelayTooShort: "validation",
  SwapRequestCancellationWindowTooShort: "validation",
  SameVersionUpgradeNotAllowed: "validation",
  AccessControlUnauthorizedAccount: "authorization",
  UnauthorisedCaller: "authorization",
  SignatureVerificationFailed: "authorization",
  InvalidPermitSignature: "authorization",
  AlreadyFulfilled: "state_conflict",
  SwapRequestCancellationAlreadyStaged: "state_conflict",
  SwapRequestCancellationNotStaged: "state_conflict",
  SwapRequestCancellationWindowNotPassed: "state_conflict",
  InsufficientVerificationFeeBalance: "state_conflict",
  NoUpgradePending: "state_conflict",
  UpgradeTooEarly: "state_conflict",
  TooLateToCancelUpgrade: "state_conflict",
  PermitExpired: "state_conflict",
  PermitNonceUsed: "state_conflict",
  HookGatewayNotSet: "state_conflict",
  PermitRelayNotSet: "state_conflict",
  HookExecutionFailed: "external",
  InsufficientBalance: "external",
  InsufficientAllowance: "external",
  NoActiveTransaction: "external"
} satisfies Record<string, SettlementErrorCategory>;

export type SettlementErrorCode = keyof typeof errorCategories;

export class SettlementError extends Error {
  readonly code: SettlementErrorCode;
  readonly category: SettlementErrorCategory;
  readonly details: Record<string, unknown>;

  constructor(code: SettlementErrorCode, details: Record<string, unknown> = {}, message?: string) {
    super(message ?? formatMessage(code, details));
    this.name = "SettlementError";
    this.code = code;
    this.category = errorCategories[code];
    this.details = details;
  }
}

export function isSettlementError(error: unknown, code?: SettlementErrorCode): error is SettlementError {
  if (!(error instanceof SettlementError)) return false;
  return code === undefined || error.code === code;
}

export function isSettlementErrorCode(value: string): value is SettlementErrorCode {
  return Object.prototype.hasOwnProperty.call(errorCategories, value);
}

function formatMessage(code: SettlementErrorCode, details: Record<string, unknown>): string {
  const entries = Object.entries(details);
  if (entries.length === 0) return code;
  const rendered = entries
    .map(([key, value]) => `${key}=${typeof value === "bigint" ? value.toString() : String(value)}`)
    .join(" ");
  return `${code}(${rendered})`;
}
