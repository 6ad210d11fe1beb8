import { Command } from 'commander';
import { ClientConfigOptions } from '../config';

type GlobalOptions = {
  apiUrl?: string;
  timeout?: string;
};

/**
 * Client options taken from the program-level flags; anything left unset
 * falls through to MAIL_AUTH_* variables and defaults.
 */
export function globalConfig(cmd: Command): ClientConfigOptions {
  const opts = cmd.optsWithGlobals<GlobalOptions>();
  const config: ClientConfigOptions = {};
  if (opts.apiUrl) {
    config.apiBaseUrl = opts.apiUrl;
  }
  if (opts.timeout) {
    config.timeout = Number(opts.timeout);
  }
  return config;
}
