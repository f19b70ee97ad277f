/**
 * Renderers for discovery output: the hierarchy tree, id listings and
 * list paths.
 */

import chalk from 'chalk';
import Table from 'cli-table3';
import type { HierarchyNode, IdListing, PathSegment } from '../../core/hierarchy.js';
import { dim, heading, warning } from './colors.js';

const ICONS: Record<HierarchyNode['kind'], string> = {
  workspace: '🏢',
  space: '📁',
  folder: '📂',
  group: '📂',
  list: '📋',
};

function nodeLabel(node: HierarchyNode): string {
  const styled =
    node.kind === 'workspace'
      ? chalk.cyan.bold(node.name)
      : node.kind === 'space'
        ? chalk.blue(node.name)
        : node.kind === 'list'
          ? chalk.green(node.name)
          : chalk.yellow(node.name);
  const id = node.id !== null ? ` ${dim(`(${node.id})`)}` : '';
  const count = node.kind === 'list' ? ` - ${node.taskCount ?? 0} tasks` : '';
  return `${ICONS[node.kind]} ${styled}${id}${count}`;
}

/** Box-drawing tree lines for a set of sibling nodes. */
export function treeLines(nodes: readonly HierarchyNode[], prefix = ''): string[] {
  const lines: string[] = [];
  nodes.forEach((node, index) => {
    const last = index === nodes.length - 1;
    lines.push(`${prefix}${last ? '└── ' : '├── '}${nodeLabel(node)}`);
    const childPrefix = prefix + (last ? '    ' : '│   ');
    if (node.error) lines.push(`${childPrefix}${chalk.red(`❌ ${node.error}`)}`);
    lines.push(...treeLines(node.children, childPrefix));
  });
  return lines;
}

export function renderHierarchy(data: { roots: HierarchyNode[]; depth: number }, quiet: boolean): string {
  if (quiet) return data.roots.map((r) => r.id ?? '').join('\n');
  if (data.roots.length === 0) return warning('No workspaces found.');
  return [heading('ClickUp Hierarchy'), ...treeLines(data.roots)].join('\n');
}

export function renderIdListing(data: IdListing, quiet: boolean): string {
  if (quiet) return data.rows.map((r) => r.id).join('\n');
  if (data.rows.length === 0) return warning(`${data.title}: nothing found.`);
  const table = new Table({ head: ['Type', 'Name', 'ID', 'Info'].map((h) => chalk.bold(h)) });
  for (const row of data.rows) table.push([row.kind, row.name, chalk.cyan(row.id), row.info]);
  return [heading(data.title), table.toString()].join('\n');
}

export function renderListPath(data: { listId: string; path: PathSegment[] | null }, quiet: boolean): string {
  if (data.path === null) return quiet ? '' : warning(`Could not find path for list ${data.listId}`);
  if (quiet) return data.path.map((s) => s.name).join(' > ');
  const lines = [heading('Path to list:')];
  data.path.forEach((segment, depth) => {
    lines.push(`${'  '.repeat(depth)}${ICONS[segment.kind]} ${segment.name} ${dim(`(${segment.id})`)}`);
  });
  return lines.join('\n');
}
