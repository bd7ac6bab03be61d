import { Command } from 'commander';
import { renderIntro } from '../render.js';
import { type CommonOptions, openContext, withCommonOptions } from './shared.js';

export const listCommand = withCommonOptions(
  new Command('list').description('Print every topic in the tour'),
).action(async (options: CommonOptions) => {
  const context = await openContext(options);
  console.log(renderIntro(context.paginator.getSnapshot().topics));
});
