import type { Command } from 'commander';

import { registerReceiveCommand } from '@/commands/receive.js';
import { registerSendCommands } from '@/commands/send.js';
import { registerStartCommand } from '@/commands/start.js';
import { registerTransactionCommands } from '@/commands/transaction.js';
import { registerUpcheckCommand } from '@/commands/upcheck.js';

/**
 * Command registration function type
 */
export type CommandRegistrar = (program: Command) => void;

/**
 * Helper to add a command group
 */
const addCommandGroup = (groupName: string): CommandRegistrar => {
  return (program: Command) => {
    program.commandsGroup(groupName);
  };
};

/**
 * Registry of all CLI commands with grouping
 * Order matters: groups organize commands in help output
 */
export const commandRegistry: CommandRegistrar[] = [
  addCommandGroup('Node Lifecycle:'),
  registerStartCommand,
  registerUpcheckCommand,

  addCommandGroup('Payloads:'),
  registerSendCommands,
  registerReceiveCommand,

  addCommandGroup('Transactions:'),
  registerTransactionCommands,
];
