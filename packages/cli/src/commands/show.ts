import { Command } from 'commander';
import { renderDetail, renderNotFound } from '../render.js';
import { type CommonOptions, openContext, withCommonOptions } from './shared.js';

export const showCommand = withCommonOptions(
  new Command('show')
    .description('Print the detail page of a topic')
    .argument('[id]', 'Topic id (default: config startAt, then the first topic)'),
).action(async (id: string | undefined, options: CommonOptions) => {
  const context = await openContext(options);
  const { paginator } = context;

  if (id !== undefined) {
    if (!paginator.getSnapshot().topics.some((t) => t.id === id)) {
      console.error(renderNotFound(id));
      process.exitCode = 1;
      return;
    }
    paginator.selectById(id);
  }

  console.log(renderDetail(paginator.getSnapshot()));
});
