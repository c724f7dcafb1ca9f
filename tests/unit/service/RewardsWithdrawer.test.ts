import { describe, expect, it } from 'vitest';
import { RewardsWithdrawer } from '../../../src/service/RewardsWithdrawer.js';
import { ETHER, FakeChainReader } from '../../helpers/fakeChain.js';
import { GNOSIS, MASTER_SAFE, SERVICE_SAFE, WITHDRAWAL, makeOperations, makeService } from '../../helpers/fixtures.js';

const addresses = { masterSafe: MASTER_SAFE, serviceSafe: SERVICE_SAFE };

function olasReader(balances: Record<string, bigint>): FakeChainReader {
  return new FakeChainReader().handles(GNOSIS.olasToken, 'balanceOf', (args) => balances[String(args[0])] ?? 0n);
}

describe('RewardsWithdrawer', () => {
  it('does nothing without a withdrawal address', async () => {
    const reader = olasReader({ [MASTER_SAFE]: ETHER });
    const operations = makeOperations();

    const report = await new RewardsWithdrawer(reader, operations).withdraw({
      service: makeService(),
      addresses,
      olasToken: GNOSIS.olasToken,
    });

    expect(report).toEqual({ withdrawals: [], failures: [] });
    expect(reader.calls).toEqual([]);
    expect(operations.transferFromMasterSafe).not.toHaveBeenCalled();
    expect(operations.transferFromServiceSafe).not.toHaveBeenCalled();
  });

  it('sweeps both Safes to the withdrawal address', async () => {
    const reader = olasReader({ [MASTER_SAFE]: 5n * ETHER, [SERVICE_SAFE]: ETHER / 2n });
    const operations = makeOperations();
    operations.transferFromMasterSafe.mockResolvedValue('0xmaster');
    operations.transferFromServiceSafe.mockResolvedValue('0xservice');
    const service = makeService();

    const report = await new RewardsWithdrawer(reader, operations).withdraw({
      service,
      addresses,
      olasToken: GNOSIS.olasToken,
      withdrawalAddress: WITHDRAWAL,
    });

    expect(report.withdrawals).toEqual([
      { txHash: '0xmaster', amount: 5, source: 'Master Safe' },
      { txHash: '0xservice', amount: 0.5, source: 'Service Safe' },
    ]);
    expect(report.failures).toEqual([]);
    expect(operations.transferFromMasterSafe).toHaveBeenCalledWith('gnosis', {
      token: GNOSIS.olasToken,
      to: WITHDRAWAL,
      amount: 5n * ETHER,
    });
    expect(operations.transferFromServiceSafe).toHaveBeenCalledWith(service, {
      token: GNOSIS.olasToken,
      to: WITHDRAWAL,
      amount: ETHER / 2n,
    });
  });

  it('still sweeps the service Safe when the master Safe is empty', async () => {
    const reader = olasReader({ [SERVICE_SAFE]: 3n * ETHER });
    const operations = makeOperations();
    operations.transferFromServiceSafe.mockResolvedValue('0xservice');

    const report = await new RewardsWithdrawer(reader, operations).withdraw({
      service: makeService(),
      addresses,
      olasToken: GNOSIS.olasToken,
      withdrawalAddress: WITHDRAWAL,
    });

    expect(report.withdrawals).toEqual([{ txHash: '0xservice', amount: 3, source: 'Service Safe' }]);
    expect(operations.transferFromMasterSafe).not.toHaveBeenCalled();
  });

  it('records a failed transfer and continues with the next Safe', async () => {
    const reader = olasReader({ [MASTER_SAFE]: ETHER, [SERVICE_SAFE]: 2n * ETHER });
    const operations = makeOperations();
    const failure = new Error('insufficient funds for gas');
    operations.transferFromMasterSafe.mockRejectedValue(failure);
    operations.transferFromServiceSafe.mockResolvedValue('0xservice');

    const report = await new RewardsWithdrawer(reader, operations).withdraw({
      service: makeService(),
      addresses,
      olasToken: GNOSIS.olasToken,
      withdrawalAddress: WITHDRAWAL,
    });

    expect(report.failures).toEqual([{ source: 'Master Safe', stage: 'transfer', error: failure }]);
    expect(report.withdrawals).toEqual([{ txHash: '0xservice', amount: 2, source: 'Service Safe' }]);
  });

  it('records a failed balance read without attempting a transfer', async () => {
    const reader = new FakeChainReader().throws(GNOSIS.olasToken, 'balanceOf', new Error('rpc timeout'));
    const operations = makeOperations();

    const report = await new RewardsWithdrawer(reader, operations).withdraw({
      service: makeService(),
      addresses,
      olasToken: GNOSIS.olasToken,
      withdrawalAddress: WITHDRAWAL,
    });

    expect(report.withdrawals).toEqual([]);
    expect(report.failures.map(({ source, stage }) => ({ source, stage }))).toEqual([
      { source: 'Master Safe', stage: 'balance' },
      { source: 'Service Safe', stage: 'balance' },
    ]);
    expect(operations.transferFromMasterSafe).not.toHaveBeenCalled();
    expect(operations.transferFromServiceSafe).not.toHaveBeenCalled();
  });
});
