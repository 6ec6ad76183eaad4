import { loadDotenv } from './dotenv';

loadDotenv();

import { isTriggerSuccess } from '@glue-trigger/shared';
import { handler } from './handler';

async function main() {
  const result = await handler({}, { awsRequestId: 'local' });

  // eslint-disable-next-line no-console
  console.log(JSON.stringify(result, null, 2));

  process.exitCode = isTriggerSuccess(result) ? 0 : 1;
}

main().catch((err) => {
  // eslint-disable-next-line no-console
  console.error(err);
  process.exit(1);
});
