import * as dotenv from 'dotenv';
import { getLogger } from '@fluidware-it/saddlebag';
import { parseArgs } from './cli/parser';
import { runApp } from './cli/app';
import { getConfig } from './config/config';

dotenv.config();

const logger = getLogger();

async function main(): Promise<number> {
  const args = parseArgs(process.argv.slice(2));
  const config = getConfig();

  logger.info('Starting k8s-impact-assessor');
  return runApp(args, config);
}

// Exit explicitly: a timed-out inventory request may still hold its socket open
main()
  .then(code => process.exit(code))
  .catch((e: unknown) => {
    logger.error(e);
    process.exit(1);
  });
