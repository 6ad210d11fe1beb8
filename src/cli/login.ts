import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import type { PrivateKey } from 'openpgp';
import { createMailAuthClient, MailAuthClient } from '../auth';
import { AppError, ErrorCode } from '../errors/types';
import { handleError } from '../errors/handler';
import { PasswordMode, SessionCredentials, UnlockedIdentity } from '../types/auth';
import { isQuiet, normalLog, outputResult } from '../utils/output';
import { canPrompt, promptInput, promptSecret, readPasswordFromStdin } from '../utils/password';
import { globalConfig } from './options';

// Interactive retries of the mailbox password before giving up
const MAX_MAILBOX_PASSWORD_TRIES = 3;

interface LoginOptions {
  username?: string;
  passwordStdin?: boolean;
  keepSession?: boolean;
}

/**
 * Create the login command for the CLI
 * Runs the SRP handshake, unlocks the key ring and prints what it found.
 *
 * The session is revoked again when the command ends unless --keep-session
 * is given, in which case the tokens are printed as JSON.
 */
export function createLoginCommand(): Command {
  const command = new Command('login');

  command
    .description('Authenticate and unlock your private keys')
    .option('-u, --username <username>', 'Account username or email')
    .option('--password-stdin', 'Read password from stdin (for scripts with special characters)')
    .option('--keep-session', 'Do not revoke the session; print its tokens instead')
    .action(async (options: LoginOptions, cmd: Command) => {
      try {
        const client = createMailAuthClient(globalConfig(cmd));

        const username = options.username ?? await promptInput('Username:', 'Username');
        const password = options.passwordStdin || !process.stdin.isTTY
          ? await readPasswordFromStdin()
          : await promptSecret('Password:', 'Password');

        const spinner = ora({ text: 'Fetching auth parameters...', isSilent: isQuiet() }).start();
        const info = await client.authInfo(username);
        spinner.stop();

        let twoFactorCode: string | undefined;
        if (info.twoFactor) {
          twoFactorCode = await promptInput('Two-factor code:', 'Two-factor code');
        }

        spinner.start('Authenticating...');
        let credentials: SessionCredentials;
        try {
          credentials = await client.auth(username, password, twoFactorCode, info);
        } catch (error) {
          spinner.fail('Authentication failed');
          throw error;
        }
        spinner.succeed(chalk.green('Authenticated'));

        let identity: UnlockedIdentity<PrivateKey>;
        try {
          identity = credentials.passwordMode === PasswordMode.Two
            ? await unlockWithMailboxPassword(client, credentials)
            : await client.unlock(credentials, password);
        } catch (error) {
          await client.revoke(credentials);
          throw error;
        }

        normalLog(chalk.cyan('\nSession Information:'));
        normalLog(`  ${chalk.dim('User ID:')}       ${identity.credentials.uid}`);
        normalLog(`  ${chalk.dim('Password Mode:')} ${identity.credentials.passwordMode === PasswordMode.Single ? 'Single' : 'Two-password'}`);
        normalLog(`  ${chalk.dim('Scope:')}         ${identity.credentials.scope || '-'}`);
        normalLog(`  ${chalk.dim('Keys:')}          ${identity.keys.map((key) => key.getKeyID().toHex()).join(', ')}`);

        if (options.keepSession) {
          outputResult({
            uid: identity.credentials.uid,
            accessToken: identity.credentials.accessToken,
            refreshToken: identity.credentials.refreshToken,
          });
          return;
        }

        await client.logout();
        normalLog(chalk.dim('\nSession revoked.'));
      } catch (error) {
        handleError(error, process.env.DEBUG === 'true');
        process.exit(1);
      }
    });

  return command;
}

async function unlockWithMailboxPassword(
  client: MailAuthClient<PrivateKey>,
  credentials: SessionCredentials
): Promise<UnlockedIdentity<PrivateKey>> {
  if (!canPrompt()) {
    throw new AppError(
      'This account uses a separate mailbox password; run login in a terminal',
      ErrorCode.VALIDATION_ERROR
    );
  }

  for (let attempt = 1; ; attempt++) {
    const mailboxPassword = await promptSecret('Mailbox password:', 'Mailbox password');
    try {
      return await client.unlock(credentials, mailboxPassword);
    } catch (error) {
      const retryable = error instanceof AppError && error.code === ErrorCode.DECRYPTION_FAILED;
      if (!retryable || attempt >= MAX_MAILBOX_PASSWORD_TRIES) {
        throw error;
      }
      console.error(chalk.yellow('Wrong mailbox password, try again.'));
    }
  }
}
