import { promises as fs } from 'fs';
import { randomBytes } from 'crypto';
import axios from 'axios';
import inquirer from 'inquirer';
import chalk from 'chalk';
import { encodeBase64Url, Fernet } from '../src/crypto/fernet';
import { generateFlag } from '../src/crypto/flag';
import { SettingsCipher } from '../src/crypto/settings';

const SCHEDULER_URL = process.env.SCHEDULER_URL || 'http://localhost:8001/submit';

// --- Helper Functions ---
function requireEnv(name: 'ENCRYPTION_KEY' | 'SIGNATURE_KEY'): string {
  const value = process.env[name];
  if (!value) {
    console.error(chalk.red(`Error: ${name} environment variable not set.`));
    console.error(chalk.yellow('Run `npm run keys -- keys` and set the generated value.'));
    process.exit(1);
  }
  return value;
}

function parseOptionalInt(input: string): number | undefined {
  const trimmed = input.trim();
  return trimmed === '' ? undefined : parseInt(trimmed, 10);
}

function validateOptionalInt(input: string): boolean | string {
  const trimmed = input.trim();
  return trimmed === '' || /^-?\d+$/.test(trimmed) || 'Enter a whole number or leave empty';
}

// --- Commands ---
function generateKeys() {
  console.log(chalk.blue('🔑 Generating new keys...'));
  const encryptionKey = Fernet.generateKey();
  const signatureKey = encodeBase64Url(randomBytes(32));

  console.log(`\n${chalk.bold('ENCRYPTION_KEY')} (Fernet): ${chalk.green(encryptionKey)}`);
  console.log(`${chalk.bold('SIGNATURE_KEY')}  (HMAC):   ${chalk.green(signatureKey)}\n`);
  console.log(chalk.yellow('Set these as environment variables for the scheduler service.'));
  console.log(chalk.yellow('Challenge authors only need SIGNATURE_KEY to precompute flags.'));
}

async function encryptSettings() {
  console.log(chalk.bold.green('🔒 Encrypt execution settings'));
  const cipher = new SettingsCipher(requireEnv('ENCRYPTION_KEY'));

  const answers = await inquirer.prompt<{ memoryLimit: string; compileTimeout: string; runTimeout: string }>([
    { name: 'memoryLimit', message: 'Memory limit in MB (-1 = unlimited, empty = feeder default):', default: '512', validate: validateOptionalInt },
    { name: 'compileTimeout', message: 'Compile timeout in ms (empty = feeder default):', default: '', validate: validateOptionalInt },
    { name: 'runTimeout', message: 'Run timeout in ms (empty = feeder default):', default: '', validate: validateOptionalInt },
  ]);

  const settings: Record<string, number> = {};
  const memoryLimit = parseOptionalInt(answers.memoryLimit);
  const compileTimeout = parseOptionalInt(answers.compileTimeout);
  const runTimeout = parseOptionalInt(answers.runTimeout);
  if (memoryLimit !== undefined) settings.memory_limit = memoryLimit;
  if (compileTimeout !== undefined) settings.compile_timeout = compileTimeout;
  if (runTimeout !== undefined) settings.run_timeout = runTimeout;

  console.log(chalk.gray(JSON.stringify(settings)));
  console.log(cipher.encrypt(settings));
  console.log(chalk.yellow("Use this value as 'settings' in submissions."));
}

async function printFlag(args: string[]) {
  const signatureKey = requireEnv('SIGNATURE_KEY');
  let output: string;

  if (args[0] === '--file') {
    if (!args[1]) {
      console.log(chalk.red('Usage: manage-keys flag --file <path>'));
      process.exit(1);
    }
    output = await fs.readFile(args[1], 'utf-8');
  } else if (args.length === 1) {
    output = args[0];
  } else {
    console.log(chalk.red('Usage: manage-keys flag <expected-output> | --file <path>'));
    process.exit(1);
  }

  console.log(generateFlag(signatureKey, output));
}

async function submit(args: string[]) {
  const [language, codePath, inputPath] = args;
  if (!language || !codePath) {
    console.log(chalk.red('Usage: manage-keys submit <language> <code-file> [input-file]'));
    process.exit(1);
  }

  let code = await fs.readFile(codePath, 'utf-8');
  if (inputPath) {
    const input = await fs.readFile(inputPath, 'utf-8');
    code = code.replace(/{{INPUT}}/g, () => input);
  }

  const payload: { code: string; language: string; settings?: string } = { code, language };
  if (process.env.SETTINGS) {
    payload.settings = process.env.SETTINGS;
  }

  const response = await axios.post<unknown>(SCHEDULER_URL, payload, { validateStatus: () => true });
  const body = response.data;
  if (response.status === 200 && typeof body === 'object' && body !== null && 'flag' in body) {
    console.log(String(body.flag));
    return;
  }

  const detail =
    typeof body === 'object' && body !== null && 'error' in body ? String(body.error) : JSON.stringify(body);
  console.error(chalk.red(`Scheduler returned an error status ${response.status}: ${detail}`));
  process.exit(1);
}

/** Runs one CLI command and resolves with the process exit code. */
export async function runCommand(argv: string[]): Promise<number> {
  const [command, ...args] = argv;
  switch (command) {
    case 'keys':
      generateKeys();
      return 0;
    case 'encrypt':
      await encryptSettings();
      return 0;
    case 'flag':
      await printFlag(args);
      return 0;
    case 'submit':
      await submit(args);
      return 0;
    default:
      console.log(chalk.red('Unknown command. Available commands: keys, encrypt, flag, submit'));
      return 1;
  }
}
