import { AccessState, GovernanceState, VotingParams } from '../../domain/governance/governanceTypes.js';

export interface GovernanceSeed {
  access: Pick<AccessState, 'owner' | 'multisig'>;
  params: VotingParams;
}

export const createDefaultState = (seed: GovernanceSeed): GovernanceState => ({
  access: {
    owner: seed.access.owner,
    pendingOwner: null,
    multisig: seed.access.multisig,
  },
  params: { ...seed.params },
  nextProposalId: 1,
  proposals: {},
  votes: {},
  tallies: {},
  voters: {},
  votedProposals: {},
  streaks: {},
  activeProposalIds: [],
  cancelledProposalIds: [],
  cleanedProposalIds: [],
  delegation: {
    global: {},
    perProposal: {},
    globalDelegators: {},
    proposalDelegators: {},
    delegatorCounts: {},
  },
  counters: {
    executed: 0,
    succeeded: 0,
    defeated: 0,
  },
});
