import { Agent } from 'undici';

import { config } from '../../config/index.js';

export const httpAgent = new Agent({
  connect: {
    timeout: config.fetcher.timeout,
  },
  keepAliveTimeout: 4000,
  keepAliveMaxTimeout: 60000,
  connections: 32,
});

export async function destroyAgents(): Promise<void> {
  await httpAgent.close();
}
