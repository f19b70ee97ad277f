/**
 * CLI workspace commands: workspaces, spaces, folders and members.
 */

import { Command } from 'commander';
import { failCommand, requireClient, resolveSpaceOption, resolveTeamOption } from '../context.js';
import { cliOutput } from '../renderers/index.js';

export function registerWorkspaceCommand(program: Command): void {
  const workspace = program.command('workspace').description('Browse workspaces, spaces and folders');

  workspace
    .command('list')
    .description('List accessible workspaces')
    .action(async () => {
      try {
        const workspaces = await requireClient().getTeams();
        cliOutput({ workspaces }, { command: 'workspace.list' });
      } catch (err) {
        failCommand(err);
      }
    });

  workspace
    .command('spaces')
    .description('List spaces in a workspace')
    .option('-t, --team-id <id>', 'Workspace (team) ID (default: configured default team)')
    .action(async (opts: { teamId?: string }) => {
      try {
        const teamId = resolveTeamOption(opts.teamId);
        const spaces = await requireClient().getSpaces(teamId);
        cliOutput({ teamId, spaces }, { command: 'workspace.spaces' });
      } catch (err) {
        failCommand(err);
      }
    });

  workspace
    .command('folders')
    .description('List folders in a space')
    .option('-s, --space-id <id>', 'Space ID (default: configured default space)')
    .action(async (opts: { spaceId?: string }) => {
      try {
        const spaceId = resolveSpaceOption(opts.spaceId);
        const folders = await requireClient().getFolders(spaceId);
        cliOutput({ spaceId, folders }, { command: 'workspace.folders' });
      } catch (err) {
        failCommand(err);
      }
    });

  workspace
    .command('members')
    .description('List members of a workspace')
    .option('-t, --team-id <id>', 'Workspace (team) ID (default: configured default team)')
    .action(async (opts: { teamId?: string }) => {
      try {
        const teamId = resolveTeamOption(opts.teamId);
        const members = await requireClient().getTeamMembers(teamId);
        cliOutput({ teamId, members }, { command: 'workspace.members' });
      } catch (err) {
        failCommand(err);
      }
    });
}
