import { Command } from 'commander';
import { Registry } from '@atelier/core';
import type { Framework } from '@atelier/core';
import { BaseCommand, errorMessage } from '../../base/base-command';
import type { BaseCommandOptions } from '../../interfaces/command';

export interface ComponentsCommandOptions extends BaseCommandOptions {
  /** Project root (default: nearest directory with an atelier config) */
  root?: string;
  tag?: string;
  type?: string;
}

function describeComponent(component: Registry.ComponentSnapshot): string {
  const tags = component.tags.length > 0 ? ` #${component.tags.join(' #')}` : '';
  return `${component.componentId} [${component.componentType}, ${component.scope}] ${component.state}${tags}`;
}

function renderTree(nodes: Record<string, Registry.ComponentTreeNode>, depth: number, lines: string[]): void {
  for (const node of Object.values(nodes)) {
    lines.push(`${'  '.repeat(depth)}${describeComponent(node)}`);
    renderTree(node.children, depth + 1, lines);
  }
}

/**
 * Components Command - lists the components a project registers
 *
 * Boots the framework at the project root (discovery included) and prints
 * the parent/child tree, or a flat list when filtered by tag or type.
 */
export class ComponentsCommand extends BaseCommand<ComponentsCommandOptions> {
  protected commandName = 'components';
  protected description = 'List discovered components as a tree';

  register(program: Command): void {
    program
      .command(this.commandName)
      .description(this.description)
      .option('-r, --root <dir>', 'Project root directory')
      .option('--json', 'Output in JSON format', false)
      .option('-t, --tag <tag>', 'Only list components carrying this tag')
      .option('--type <type>', `Only list components of this type (${Registry.COMPONENT_TYPES.join('|')})`)
      .option('-v, --verbose', 'Show technical details on errors', false)
      .option('-q, --quiet', 'Suppress text output', false)
      .action(async (options: ComponentsCommandOptions) => {
        await this.execute(options);
      });
  }

  async execute(options: ComponentsCommandOptions): Promise<void> {
    const { tag, type } = options;
    if (type !== undefined && !Registry.isComponentType(type)) {
      this.handleError(`Unknown component type: ${type} (expected one of ${Registry.COMPONENT_TYPES.join(', ')})`, options);
      return;
    }

    let framework: Framework.Framework;
    try {
      framework = await this.container.getFramework({ ...(options.root !== undefined && { root: options.root }) });
    } catch (error) {
      this.handleError(`Failed to load project: ${errorMessage(error)}`, options, error instanceof Error ? error : undefined);
      return;
    }

    try {
      const { registry } = framework;

      if (tag === undefined && type === undefined) {
        const tree = registry.getComponentTree();
        const lines: string[] = [];
        renderTree(tree, 0, lines);
        const count = registry.getAllComponents().size;
        this.handleSuccess(tree, options, count === 0 ? ['No components registered.'] : [`Components (${count}):`, ...lines]);
        return;
      }

      const tagged = tag === undefined ? null : new Set(registry.getComponentsByTag(tag).map((component) => component.componentId));
      const candidates = type === undefined ? [...registry.getAllComponents().values()] : registry.getComponentsByType(type);
      const matches = candidates
        .filter((component) => tagged === null || tagged.has(component.componentId))
        .map((component) => component.toJSON());

      this.handleSuccess(
        matches,
        options,
        matches.length === 0 ? ['No components match the given filters.'] : matches.map(describeComponent)
      );
    } finally {
      framework.dispose();
    }
  }
}
