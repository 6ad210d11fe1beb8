/**
 * Password input for CLI commands.
 *
 * Passwords come from a piped stdin (--password-stdin) or an interactive
 * prompt. They are NEVER read from environment variables or CLI flags
 * (env vars leak via /proc/pid/environ; CLI flags leak via `ps`).
 */

import inquirer from 'inquirer';
import { AppError, ErrorCode } from '../errors/types';

/**
 * Read password from stdin pipe.
 * Rejects if nothing arrives or times out after 5 s.
 */
export function readPasswordFromStdin(): Promise<string> {
  return new Promise((resolve, reject) => {
    let data = '';
    const timeout = setTimeout(() => {
      reject(new AppError('Timeout reading password from stdin', ErrorCode.VALIDATION_ERROR));
    }, 5000);

    process.stdin.setEncoding('utf8');
    process.stdin.on('data', (chunk) => { data += chunk; });
    process.stdin.on('end', () => {
      clearTimeout(timeout);
      const trimmed = data.trim();
      if (!trimmed) {
        reject(new AppError('No password received from stdin', ErrorCode.VALIDATION_ERROR));
        return;
      }
      resolve(trimmed);
    });
    process.stdin.on('error', (err) => {
      clearTimeout(timeout);
      reject(err);
    });
    process.stdin.resume();
  });
}

export function canPrompt(): boolean {
  return Boolean(process.stdin.isTTY && process.stdout.isTTY);
}

function requireTty(what: string): void {
  if (!canPrompt()) {
    throw new AppError(
      `${what} required but no terminal is available`,
      ErrorCode.VALIDATION_ERROR,
      { what }
    );
  }
}

export async function promptInput(message: string, what: string): Promise<string> {
  requireTty(what);
  const answers = await inquirer.prompt<{ value: string }>([
    {
      type: 'input',
      name: 'value',
      message,
      validate: (input: string) => input.trim().length > 0 || `${what} is required`,
    },
  ]);
  return answers.value.trim();
}

export async function promptSecret(message: string, what: string): Promise<string> {
  requireTty(what);
  const answers = await inquirer.prompt<{ value: string }>([
    {
      type: 'password',
      name: 'value',
      message,
      mask: '*',
      validate: (input: string) => input.length > 0 || `${what} is required`,
    },
  ]);
  return answers.value;
}
