import { createInterface } from 'node:readline';
import { Command } from 'commander';
import { createTourSession } from '../tour.js';
import { type CommonOptions, openContext, withCommonOptions } from './shared.js';

export const tourCommand = withCommonOptions(
  new Command('tour').description('Browse the topics interactively'),
).action(async (options: CommonOptions) => {
  const context = await openContext(options);
  const session = createTourSession(context.paginator);
  const rl = createInterface({ input: process.stdin, output: process.stdout });

  try {
    console.log(session.start().output);
    rl.setPrompt('> ');
    rl.prompt();

    for await (const line of rl) {
      const outcome = session.handle(line);
      if (outcome.type === 'quit') break;
      console.log(outcome.output);
      rl.prompt();
    }
  } finally {
    session.close();
    rl.close();
  }
});
