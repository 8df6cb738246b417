#!/usr/bin/env node
import * as readline from 'readline';
import { logger } from './core/logger';
import { errorMessage } from './core/errors';
import { Conversation } from './graph/conversation';
import { QueryOrchestrator } from './graph/orchestrator';
import { createDefaultCapabilities } from './services/capabilities';
import { validateInput } from './utils/security';

async function ask(
  orchestrator: QueryOrchestrator,
  conversation: Conversation,
  input: string
): Promise<void> {
  const query = validateInput(input);
  let streamed = false;

  process.stdout.write('\n');
  for await (const event of orchestrator.streamQuery(conversation, query)) {
    switch (event.type) {
      case 'step':
        logger.debug('Step', { step: event.step });
        break;
      case 'fallback':
        if (streamed) process.stdout.write('\n');
        streamed = false;
        console.log(`\n(retrying with a simpler search: ${event.reason})\n`);
        break;
      case 'fragment':
        streamed = true;
        process.stdout.write(event.text);
        break;
      case 'complete': {
        const { result } = event;
        console.log('\n');
        if (result.citations.length > 0) {
          console.log('Sources:');
          result.citations.forEach(source => console.log(`  - ${source}`));
        }
        console.log(
          `\n${result.durationMs}ms, ${result.retrievalCycles} retrieval(s), ${result.rewriteCount} rewrite(s)${
            result.usedFallback ? ', fallback' : ''
          }\n`
        );
        break;
      }
      case 'error':
        console.error(`\nError: ${event.error.message}\n`);
        break;
    }
  }
}

async function initCLI(): Promise<void> {
  const orchestrator = new QueryOrchestrator(createDefaultCapabilities());
  const conversation = new Conversation();

  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });

  console.log('\nDocument Q&A\n');
  console.log('Type your question or "exit" to quit\n');

  const askQuestion = () => {
    rl.question('> ', input => {
      const query = input.trim();

      if (query.toLowerCase() === 'exit') {
        console.log('\nGoodbye!\n');
        rl.close();
        return;
      }

      if (!query) {
        askQuestion();
        return;
      }

      void ask(orchestrator, conversation, query)
        .catch((error: unknown) => console.error(`\nError: ${errorMessage(error)}\n`))
        .finally(askQuestion);
    });
  };

  askQuestion();
}

if (require.main === module) {
  initCLI().catch((error: unknown) => {
    logger.error('CLI failed to start', { error: errorMessage(error) });
    process.exit(1);
  });
}
