import type { ChainReader } from '../chain/ChainClient.js';
import { OLAS_DECIMALS } from '../chain/constants.js';
import { getTokenBalance } from '../chain/erc20.js';
import { toDecimal } from '../chain/values.js';
import type { OperateService, ServiceOperations } from '../operate/types.js';
import { toError } from '../shared/errors.js';
import type { ServiceAddresses } from './BalanceAggregator.js';

export type WithdrawalSource = 'Master Safe' | 'Service Safe';

export interface Withdrawal {
  txHash: string;
  /** OLAS */
  amount: number;
  source: WithdrawalSource;
}

export interface WithdrawalFailure {
  source: WithdrawalSource;
  stage: 'balance' | 'transfer';
  error: Error;
}

export interface WithdrawalReport {
  withdrawals: Withdrawal[];
  failures: WithdrawalFailure[];
}

export interface WithdrawalRequest {
  service: OperateService;
  addresses: Pick<ServiceAddresses, 'masterSafe' | 'serviceSafe'>;
  olasToken: string;
  withdrawalAddress?: string;
}

/**
 * Sweeps OLAS from the master Safe and from the service Safe to the
 * withdrawal address. Each source is read and transferred on its own; a
 * failure is recorded in the report and the other source still runs.
 */
export class RewardsWithdrawer {
  constructor(
    private readonly reader: ChainReader,
    private readonly operations: ServiceOperations,
  ) {}

  async withdraw(request: WithdrawalRequest): Promise<WithdrawalReport> {
    const report: WithdrawalReport = { withdrawals: [], failures: [] };
    const { withdrawalAddress } = request;
    if (!withdrawalAddress) {
      return report;
    }

    await this.sweep(report, 'Master Safe', request.addresses.masterSafe, request.olasToken, (amount) =>
      this.operations.transferFromMasterSafe(request.service.homeChain, {
        token: request.olasToken,
        to: withdrawalAddress,
        amount,
      }),
    );

    await this.sweep(report, 'Service Safe', request.addresses.serviceSafe, request.olasToken, (amount) =>
      this.operations.transferFromServiceSafe(request.service, {
        token: request.olasToken,
        to: withdrawalAddress,
        amount,
      }),
    );

    return report;
  }

  private async sweep(
    report: WithdrawalReport,
    source: WithdrawalSource,
    holder: string,
    olasToken: string,
    transfer: (amount: bigint) => Promise<string>,
  ): Promise<void> {
    let balance: bigint;
    try {
      balance = await getTokenBalance(this.reader, olasToken, holder);
    } catch (error) {
      report.failures.push({ source, stage: 'balance', error: toError(error) });
      return;
    }

    if (balance === 0n) {
      return;
    }

    try {
      const txHash = await transfer(balance);
      report.withdrawals.push({ txHash, amount: toDecimal(balance, OLAS_DECIMALS), source });
    } catch (error) {
      report.failures.push({ source, stage: 'transfer', error: toError(error) });
    }
  }
}
