import { Command } from 'commander';

export type GlobalOptions = {
  json?: boolean;
  debug?: boolean;
};

/**
 * Global options from any command context
 */
export function getGlobalOpts(cmd: Command): GlobalOptions {
  let current = cmd;
  while (current.parent) {
    current = current.parent;
  }
  return current.opts<GlobalOptions>();
}
