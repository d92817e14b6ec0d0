import { ErrorCode, conflict } from '../../errors/taxonomy.js';
import { EngineEnv, GovernanceState, Proposal, ProposalStatus } from './governanceTypes.js';
import { ProposalRegistry, removeId } from './proposalRegistry.js';
import { compareWeights, ZERO_WEIGHT } from './weights.js';

export interface TallyScan {
  highestWeight: string;
  leaders: number[];
}

export interface WinningOption {
  option: number;
  label: string;
  weight: string;
}

/** Every option holding the maximum tally, in option order. */
export function scanTally(tally: readonly string[]): TallyScan {
  let highestWeight = ZERO_WEIGHT;
  let leaders: number[] = [];
  tally.forEach((weight, option) => {
    const order = compareWeights(weight, highestWeight);
    if (order > 0 || leaders.length === 0) {
      highestWeight = weight;
      leaders = [option];
    } else if (order === 0) {
      leaders.push(option);
    }
  });
  return { highestWeight, leaders };
}

/**
 * Lifecycle Controller.
 *
 * pending → active on first vote; active → succeeded | defeated | tie at
 * execution once the timelock is over; pending | active → cancelled
 * before voteEnd (see ProposalRegistry.cancelProposal).
 */
export class LifecycleController {
  constructor(
    private readonly state: GovernanceState,
    private readonly env: EngineEnv,
    private readonly registry: ProposalRegistry,
  ) {}

  executeProposal(proposalId: number): Proposal {
    const proposal = this.registry.require(proposalId);
    if (this.env.clock.now() < proposal.timelockEnd) {
      throw conflict(ErrorCode.TimelockNotOver, 'Timelock has not elapsed.', {
        proposalId,
        timelockEnd: proposal.timelockEnd,
      });
    }
    if (proposal.status !== 'active') {
      throw conflict(ErrorCode.InvalidProposalStatus, `Proposal is ${proposal.status}.`, { proposalId });
    }

    this.state.activeProposalIds = removeId(this.state.activeProposalIds, proposalId);
    this.state.counters.executed += 1;

    if (proposal.votesCounted < proposal.minimumVotes) {
      this.finalize(proposal, 'defeated');
      this.state.counters.defeated += 1;
      return proposal;
    }

    // The running leader kept at cast time does not track ties.
    const { highestWeight, leaders } = scanTally(this.registry.tallyOf(proposalId));
    if (leaders.length > 1) {
      proposal.winningOption = -1;
      proposal.highestWeight = highestWeight;
      this.finalize(proposal, 'tie');
    } else {
      proposal.winningOption = leaders[0] ?? -1;
      proposal.highestWeight = highestWeight;
      this.finalize(proposal, 'succeeded');
    }
    this.state.counters.succeeded += 1;
    return proposal;
  }

  getWinningOption(proposalId: number): WinningOption {
    const proposal = this.registry.require(proposalId);
    if (this.env.clock.now() <= proposal.timelockEnd) {
      throw conflict(ErrorCode.TimelockNotOver, 'Timelock has not elapsed.', {
        proposalId,
        timelockEnd: proposal.timelockEnd,
      });
    }
    if (proposal.status !== 'succeeded') {
      throw conflict(ErrorCode.ProposalNotSucceeded, `Proposal is ${proposal.status}.`, { proposalId });
    }
    return {
      option: proposal.winningOption,
      label: proposal.options[proposal.winningOption] ?? '',
      weight: proposal.highestWeight,
    };
  }

  private finalize(proposal: Proposal, status: ProposalStatus): void {
    proposal.status = status;
    this.env.notify({
      type: 'proposal.executed',
      proposalId: proposal.id,
      status,
      winningOption: proposal.winningOption,
      highestWeight: proposal.highestWeight,
    });
  }
}
