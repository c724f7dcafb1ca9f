import type { Provider } from 'ethers';
import type { ChainReader } from '../chain/ChainClient.js';
import { getChainProfile } from '../chain/constants.js';
import type { FileConfig } from '../config/index.js';
import { operateLogger } from '../logging/index.js';
import { OperateProfile } from '../operate/OperateProfile.js';
import { OperateServiceManager } from '../operate/OperateServiceManager.js';
import type { StakingStatusOptions } from '../staking/stakingStatus.js';
import { StakedService } from './StakedService.js';

export interface ServiceRegistryOptions {
  fileConfig: FileConfig;
  reader: ChainReader;
  provider: Provider;
  status: StakingStatusOptions;
  password?: string;
  withdrawalAddress?: string;
}

/**
 * Every service of every configured operator, in config order.
 */
export async function loadStakedServices(options: ServiceRegistryOptions): Promise<StakedService[]> {
  const services: StakedService[] = [];

  for (const [operatorName, operatorPath] of Object.entries(options.fileConfig.operators)) {
    const profile = OperateProfile.fromOperatorPath(operatorPath);
    const masterWallet = await profile.loadMasterWallet();
    const operations = new OperateServiceManager({
      profile,
      masterWallet,
      reader: options.reader,
      provider: options.provider,
      password: options.password,
      stakingPrograms: options.fileConfig.stakingPrograms,
    });

    const operatorServices = await profile.listServices();
    operateLogger.info({ operator: operatorName, services: operatorServices.length }, 'Operator loaded');

    for (const service of operatorServices) {
      services.push(new StakedService({
        name: `${operatorName}-${service.name}`,
        service,
        operations,
        reader: options.reader,
        chain: getChainProfile(service.homeChain),
        status: options.status,
        withdrawalAddress: options.withdrawalAddress,
      }));
    }
  }

  return services;
}
