import { beforeEach, describe, expect, it, vi } from 'vitest';
import {
  ClaimCommand,
  IpCommand,
  JobsCommand,
  SlotsCommand,
  StakingStatusCommand,
  WithdrawCommand,
  type CommandContext,
  type ReplyOptions,
} from '../../../src/bot/commands/index.js';
import { StakedService } from '../../../src/service/StakedService.js';
import { ETHER, FakeChainReader } from '../../helpers/fakeChain.js';
import {
  GNOSIS,
  MASTER_SAFE,
  SERVICE_SAFE,
  STAKING_CONTRACT,
  makeOperations,
  makeService,
} from '../../helpers/fixtures.js';

const CHECKER = '0x5000000000000000000000000000000000000005';
const MECH = '0x6000000000000000000000000000000000000006';

class RecordingContext implements CommandContext {
  readonly replies: Array<{ text: string; extra?: ReplyOptions }> = [];

  async reply(text: string, extra?: ReplyOptions): Promise<unknown> {
    this.replies.push({ text, extra });
    return undefined;
  }
}

function chainWithStakedService(): FakeChainReader {
  return new FakeChainReader()
    .returns(CHECKER, 'mechMarketplace', MECH)
    .returns(STAKING_CONTRACT, 'mapServiceInfo', [SERVICE_SAFE, MASTER_SAFE, 0n, 2n * ETHER, 0n])
    .returns(MECH, 'mapRequestsCounts', 30n)
    .returns(STAKING_CONTRACT, 'getServiceInfo', [SERVICE_SAFE, MASTER_SAFE, [1n, 26n], 0n, 0n, 0n])
    .returns(CHECKER, 'livenessRatio', 11_574_074_074_074n)
    .returns(STAKING_CONTRACT, 'livenessPeriod', 86_400n)
    .returns(STAKING_CONTRACT, 'tsCheckpoint', 1_700_000_000n)
    .returns(STAKING_CONTRACT, 'metadataHash', `0x${'01'.repeat(32)}`)
    .returns(GNOSIS.olasToken, 'decimals', 18n)
    .returns(GNOSIS.wrappedNativeToken, 'decimals', 18n)
    .returns(GNOSIS.wrappedNativeToken, 'balanceOf', 0n)
    .handles(GNOSIS.olasToken, 'balanceOf', (args) => (args[0] === MASTER_SAFE ? 12n * ETHER + ETHER / 4n : 3n * ETHER));
}

function stakedService(
  name: string,
  reader: FakeChainReader,
  operations = makeOperations(),
  instances?: string[],
): StakedService {
  operations.getActivityChecker.mockResolvedValue(CHECKER);
  return new StakedService({
    name,
    service: makeService({ instances }),
    operations,
    reader,
    chain: GNOSIS,
    status: { timezone: 'UTC', ipfsGatewayUrl: 'https://ipfs.example/ipfs/', metadataTimeoutMs: 1_000 },
  });
}

describe('StakingStatusCommand', () => {
  beforeEach(() => {
    vi.stubGlobal('fetch', vi.fn<typeof fetch>().mockImplementation(async () =>
      new Response('{"name":"Expert 5"}', { status: 200 }),
    ));
  });

  it('reports each service, isolates failures and counts a shared master Safe once', async () => {
    const reader = chainWithStakedService();
    const services = [
      stakedService('alice-a', reader),
      stakedService('alice-b', reader, makeOperations(), []),
      stakedService('alice-c', reader),
    ];
    const ctx = new RecordingContext();

    await new StakingStatusCommand(services, async () => 2).execute(ctx);

    const status = '2 OLAS [4/1]\nStaking program: Expert 5\nNext epoch: 2023-11-15 22:13:20 UTC';
    expect(ctx.replies).toEqual([{
      text: [
        `[alice-a] ${status}`,
        '[alice-b] Failed to get staking status: No agent instances found for service trader on gnosis',
        `[alice-c] ${status}`,
        'Total rewards = 22.25 OLAS (4 accrued + 6 in agent safes + 12.25 in master safes) [$44.5]',
      ].join('\n\n'),
      extra: undefined,
    }]);
  });
});

describe('ClaimCommand', () => {
  it('refuses when manual claim is disabled', async () => {
    const operations = makeOperations();
    const ctx = new RecordingContext();

    await new ClaimCommand([stakedService('alice-a', new FakeChainReader(), operations)], false).execute(ctx);

    expect(ctx.replies[0]?.text).toBe('Manual claim is disabled');
    expect(operations.claimRewards).not.toHaveBeenCalled();
  });

  it('lists claimed amounts and treats failures as nothing claimed', async () => {
    const claimed = makeOperations();
    claimed.claimRewards.mockResolvedValue(12n * ETHER + ETHER / 2n);
    const failing = makeOperations();
    failing.claimRewards.mockRejectedValue(new Error('nonce too low'));
    const ctx = new RecordingContext();

    await new ClaimCommand([
      stakedService('alice-a', new FakeChainReader(), claimed),
      stakedService('alice-b', new FakeChainReader(), failing),
    ], true).execute(ctx);

    expect(ctx.replies[0]?.text).toBe('[alice-a] Claimed 12.5 OLAS rewards into the Master safe.');
  });

  it('says so when nothing was claimed', async () => {
    const operations = makeOperations();
    operations.claimRewards.mockResolvedValue(0n);
    const ctx = new RecordingContext();

    await new ClaimCommand([stakedService('alice-a', new FakeChainReader(), operations)], true).execute(ctx);

    expect(ctx.replies[0]?.text).toBe('No rewards claimed');
  });
});

describe('WithdrawCommand', () => {
  it('reports services that cannot withdraw', async () => {
    const ctx = new RecordingContext();

    await new WithdrawCommand([stakedService('alice-a', new FakeChainReader())]).execute(ctx);

    expect(ctx.replies).toEqual([{
      text: '\\[alice-a] Cannot withdraw rewards',
      extra: { parse_mode: 'Markdown', link_preview_options: { is_disabled: true } },
    }]);
  });
});

describe('SlotsCommand', () => {
  it('reports capacity minus staked services', async () => {
    const reader = new FakeChainReader()
      .returns('0x7000000000000000000000000000000000000007', 'getServiceIds', [1n, 2n, 3n]);
    const ctx = new RecordingContext();

    await new SlotsCommand(reader, [
      { name: 'Test program', address: '0x7000000000000000000000000000000000000007', slots: 10 },
    ]).execute(ctx);

    expect(ctx.replies[0]?.text).toBe('[Test program] 7 available slots');
  });
});

describe('JobsCommand', () => {
  it('renders next runs in the local timezone', async () => {
    const ctx = new RecordingContext();
    const jobs = () => [{ name: 'autoclaim', nextRun: new Date('2024-02-01T09:00:00Z') }];

    await new JobsCommand(jobs, 'UTC').execute(ctx);

    expect(ctx.replies[0]?.text).toBe('• autoclaim: 2024-02-01 09:00:00 UTC');
  });
});

describe('IpCommand', () => {
  it('replies with the public address', async () => {
    const ctx = new RecordingContext();

    await new IpCommand(async () => '203.0.113.7').execute(ctx);

    expect(ctx.replies[0]?.text).toBe('Public IP address: 203.0.113.7');
  });
});
