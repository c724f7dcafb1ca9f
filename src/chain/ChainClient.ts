import { Contract, FetchRequest, JsonRpcProvider, getAddress } from 'ethers';
import { chainLogger } from '../logging/index.js';

/**
 * Read access to a chain. Everything that reads contract state goes through
 * this seam, so calculators can be exercised against an in-memory reader.
 */
export interface ChainReader {
  getNativeBalance(address: string): Promise<bigint>;
  call(address: string, abi: readonly string[], method: string, args?: readonly unknown[]): Promise<unknown>;
}

export interface ChainClientOptions {
  rpcUrl: string;
  timeoutMs: number;
}

export class ChainClient implements ChainReader {
  readonly provider: JsonRpcProvider;

  constructor(options: ChainClientOptions) {
    const request = new FetchRequest(options.rpcUrl);
    request.timeout = options.timeoutMs;
    this.provider = new JsonRpcProvider(request);

    chainLogger.debug({ timeoutMs: options.timeoutMs }, 'Chain client created');
  }

  async getNativeBalance(address: string): Promise<bigint> {
    return this.provider.getBalance(getAddress(address));
  }

  async call(address: string, abi: readonly string[], method: string, args: readonly unknown[] = []): Promise<unknown> {
    const contract = new Contract(getAddress(address), abi, this.provider);
    const result: unknown = await contract.getFunction(method).staticCall(...args);
    return result;
  }

  destroy(): void {
    this.provider.destroy();
  }
}
