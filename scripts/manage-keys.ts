import 'dotenv/config';
import chalk from 'chalk';
import { runCommand } from './keyCommands';

runCommand(process.argv.slice(2))
  .then((code) => process.exit(code))
  .catch(err => {
    console.error(chalk.red.bold('An unexpected error occurred:'), err);
    process.exit(1);
  });
