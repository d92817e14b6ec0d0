export const ErrorCode = {
  // Authorization
  OnlyOwner: 'only_owner',
  OnlyMultisig: 'only_multisig',
  OnlyPendingOwner: 'only_pending_owner',
  RenounceDisabled: 'renounce_disabled',
  MissingCaller: 'missing_caller',

  // Existence / shape
  ProposalNotExists: 'proposal_not_exists',
  InvalidOption: 'invalid_option',
  InvalidAddress: 'invalid_address',
  AtLeastTwoOptionsRequired: 'at_least_two_options_required',
  OptionsLimitExceeded: 'options_limit_exceeded',
  InvalidParameter: 'invalid_parameter',
  NotVoted: 'not_voted',

  // State / timing
  VotingNotActive: 'voting_not_active',
  VotingAlreadyStarted: 'voting_already_started',
  VotingAlreadyEnded: 'voting_already_ended',
  InvalidProposalStatus: 'invalid_proposal_status',
  TimelockNotOver: 'timelock_not_over',
  ExtensionLimitReached: 'extension_limit_reached',
  ProposalNotSucceeded: 'proposal_not_succeeded',
  ProposalDataAlreadyRemoved: 'proposal_data_already_removed',

  // Delegation integrity
  AlreadyVoted: 'already_voted',
  AlreadyDelegated: 'already_delegated',
  NoDelegationToRevoke: 'no_delegation_to_revoke',
  CannotDelegateSelf: 'cannot_delegate_self',
  DelegatorCannotVote: 'delegator_cannot_vote',
  MaximumDelegatorsLimitReached: 'maximum_delegators_limit_reached',

  // Transport
  InvalidPayload: 'invalid_payload',
  InternalError: 'internal_error',
} as const;

export type ErrorCode = typeof ErrorCode[keyof typeof ErrorCode];

export class DomainError extends Error {
  constructor(
    public readonly code: ErrorCode,
    public readonly statusCode: number,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
  }
}

export const unauthorized = (code: ErrorCode, message: string): DomainError => (
  new DomainError(code, 403, message)
);

export const notFound = (code: ErrorCode, message: string, details?: Record<string, unknown>): DomainError => (
  new DomainError(code, 404, message, details)
);

export const badInput = (code: ErrorCode, message: string, details?: Record<string, unknown>): DomainError => (
  new DomainError(code, 400, message, details)
);

export const conflict = (code: ErrorCode, message: string, details?: Record<string, unknown>): DomainError => (
  new DomainError(code, 409, message, details)
);

export const toErrorEnvelope = (
  code: ErrorCode,
  message: string,
  details?: unknown,
): {
  error: {
    code: ErrorCode;
    message: string;
    details?: unknown;
  };
} => ({
  error: {
    code,
    message,
    ...(details === undefined ? {} : { details }),
  },
});
