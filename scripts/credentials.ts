import dotenvFlow from 'dotenv-flow';

import { createTokenStore } from '../src/bootstrap';
import { getTokenStoreConfig } from '../src/config/mercedesConfig';

dotenvFlow.config({ silent: true });

type CredentialCommand = 'status' | 'clear';

const parseArgs = (): CredentialCommand => {
  const args = process.argv.slice(2);
  if (args.includes('--clear')) {
    return 'clear';
  }

  return 'status';
};

const run = async () => {
  const command = parseArgs();
  const store = createTokenStore(getTokenStoreConfig());

  if (command === 'clear') {
    await store.clear();
    // eslint-disable-next-line no-console
    console.log(JSON.stringify({ store: store.describe(), cleared: true }, null, 2));
    return;
  }

  const credential = await store.load();
  const summary = credential
    ? {
        store: store.describe(),
        present: true,
        expiresAt: new Date(credential.expiresAt).toISOString(),
        expired: Date.now() >= credential.expiresAt,
        scope: credential.scope,
      }
    : { store: store.describe(), present: false };

  // eslint-disable-next-line no-console
  console.log(JSON.stringify(summary, null, 2));
};

run().catch((error) => {
  // eslint-disable-next-line no-console
  console.error(error);
  process.exitCode = 1;
});
