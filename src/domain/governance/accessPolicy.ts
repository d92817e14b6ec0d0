import { ErrorCode, badInput, unauthorized } from '../../errors/taxonomy.js';
import { EngineEnv, GovernanceState, ZERO_ADDRESS } from './governanceTypes.js';

export type Role = 'none' | 'owner' | 'multisig';

export type EntryPoint =
  | 'createProposal'
  | 'updateProposalDetails'
  | 'cancelProposal'
  | 'extendVoting'
  | 'updateVotingParams'
  | 'executeProposal'
  | 'removeCancelledProposalData'
  | 'setMaxDelegators'
  | 'changeMultisig'
  | 'transferOwnership'
  | 'acceptOwnership'
  | 'renounceOwnership'
  | 'castVote'
  | 'delegateGlobally'
  | 'delegateForProposal'
  | 'revokeGlobalDelegation'
  | 'revokeProposalDelegation';

/** The single role each mutating entry point demands of its caller. */
export const ENTRY_POINT_ROLES: Readonly<Record<EntryPoint, Role>> = {
  createProposal: 'multisig',
  updateProposalDetails: 'multisig',
  cancelProposal: 'multisig',
  extendVoting: 'multisig',
  updateVotingParams: 'multisig',
  executeProposal: 'multisig',
  removeCancelledProposalData: 'owner',
  setMaxDelegators: 'owner',
  changeMultisig: 'owner',
  transferOwnership: 'owner',
  acceptOwnership: 'none',
  renounceOwnership: 'owner',
  castVote: 'none',
  delegateGlobally: 'none',
  delegateForProposal: 'none',
  revokeGlobalDelegation: 'none',
  revokeProposalDelegation: 'none',
};

export function assertAccount(account: string, field: string): void {
  if (!account || account.trim().length === 0 || account === ZERO_ADDRESS) {
    throw badInput(ErrorCode.InvalidAddress, `${field} must be a non-null account.`, { [field]: account });
  }
}

/**
 * Owner and multisig controller. The owner is administrative and can only
 * be handed over in two steps; the controller runs proposal operations and
 * is replaceable by the owner alone.
 */
export class AccessPolicy {
  constructor(
    private readonly state: GovernanceState,
    private readonly env: EngineEnv,
  ) {}

  roleOf(caller: string): Role {
    if (caller === this.state.access.owner) return 'owner';
    if (caller === this.state.access.multisig) return 'multisig';
    return 'none';
  }

  guard(caller: string, entryPoint: EntryPoint): void {
    const role = ENTRY_POINT_ROLES[entryPoint];
    if (role === 'owner' && caller !== this.state.access.owner) {
      throw unauthorized(ErrorCode.OnlyOwner, `${entryPoint} is restricted to the owner.`);
    }
    if (role === 'multisig' && caller !== this.state.access.multisig) {
      throw unauthorized(ErrorCode.OnlyMultisig, `${entryPoint} is restricted to the multisig controller.`);
    }
  }

  changeMultisig(newMultisig: string): void {
    assertAccount(newMultisig, 'newMultisig');

    const previousMultisig = this.state.access.multisig;
    this.state.access.multisig = newMultisig;
    this.env.notify({ type: 'multisig.transferred', previousMultisig, newMultisig });
  }

  transferOwnership(newOwner: string): void {
    assertAccount(newOwner, 'newOwner');

    this.state.access.pendingOwner = newOwner;
    this.env.notify({
      type: 'ownership.transfer.started',
      owner: this.state.access.owner,
      pendingOwner: newOwner,
    });
  }

  acceptOwnership(caller: string): void {
    if (this.state.access.pendingOwner === null || caller !== this.state.access.pendingOwner) {
      throw unauthorized(ErrorCode.OnlyPendingOwner, 'Caller is not the pending owner.');
    }

    const previousOwner = this.state.access.owner;
    this.state.access.owner = caller;
    this.state.access.pendingOwner = null;
    this.env.notify({ type: 'ownership.transferred', previousOwner, newOwner: caller });
  }

  renounceOwnership(): never {
    throw unauthorized(ErrorCode.RenounceDisabled, 'Ownership cannot be renounced.');
  }
}
