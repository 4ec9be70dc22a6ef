/**
 * Registration functions for every top-level command.
 */

import type { Command } from 'commander';

import { registerComputeCommand } from '@/commands/compute.js';
import { registerNodesCommands } from '@/commands/nodes/index.js';

export const commandRegistry: readonly ((program: Command) => void)[] = [
  registerComputeCommand,
  registerNodesCommands,
];
