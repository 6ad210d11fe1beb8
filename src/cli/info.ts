import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { createMailAuthClient } from '../auth';
import { verifyAndGetModulus } from '../auth/srp/modulus';
import { handleError } from '../errors/handler';
import { isQuiet, normalLog, outputResult } from '../utils/output';
import { globalConfig } from './options';

/**
 * Create info command
 * Fetch the SRP parameters the server offers for a user and check the
 * modulus signature, without sending any password material.
 */
export function createInfoCommand(): Command {
  const info = new Command('info');

  info
    .description('Show the SRP parameters the server offers for a user')
    .argument('<username>', 'Account username or email')
    .option('--json', 'Print the result as JSON')
    .action(async (username: string, options: { json?: boolean }, cmd: Command) => {
      try {
        const client = createMailAuthClient(globalConfig(cmd));

        const spinner = ora({ text: 'Fetching auth parameters...', isSilent: isQuiet() || options.json }).start();
        const authInfo = await client.authInfo(username);
        spinner.text = 'Verifying modulus signature...';
        const modulus = await verifyAndGetModulus(authInfo.modulus);
        spinner.stop();

        if (options.json) {
          outputResult({
            username: authInfo.username,
            version: authInfo.version,
            twoFactor: authInfo.twoFactor,
            srpSession: authInfo.srpSession,
            modulusBits: modulus.length * 8,
            modulusVerified: true,
          });
          return;
        }

        normalLog(chalk.bold(`\nAuth info: ${authInfo.username}\n`));
        normalLog(`  ${chalk.cyan('Version:')}     ${authInfo.version}`);
        normalLog(`  ${chalk.cyan('Two-factor:')}  ${authInfo.twoFactor ? 'required' : 'off'}`);
        normalLog(`  ${chalk.cyan('SRP session:')} ${authInfo.srpSession}`);
        normalLog(`  ${chalk.cyan('Modulus:')}     ${modulus.length * 8} bits, signature ${chalk.green('verified')}`);
      } catch (error) {
        handleError(error, process.env.DEBUG === 'true');
        process.exit(1);
      }
    });

  return info;
}
