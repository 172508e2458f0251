// src/repl.ts
import readline from 'readline';
import { CommandRouter } from './router/index.js';
import { ServiceContainer, closeServices } from './services/index.js';
import { Button, Reply } from './tools/index.js';
import { info, error } from './utils/logger.js';

/** Terminal rendering of an HTML reply body. */
export function toPlainText(html: string): string {
  return html
    .replace(/<\/?(b|i|u|code|pre)>/g, '')
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&quot;/g, '"')
    .replace(/&amp;/g, '&');
}

/**
 * Prints replies with their buttons numbered across the whole batch, so
 * `#3` always means the third button shown. Returns the buttons in that order.
 */
export function renderReplies(replies: Reply[]): { output: string; buttons: Button[] } {
  const buttons: Button[] = [];
  const blocks = replies.map(reply => {
    const lines = [toPlainText(reply.text)];
    for (const row of reply.buttons) {
      const cells = row.map(btn => {
        buttons.push(btn);
        return 'url' in btn ? `[${buttons.length}] ${btn.label} (${btn.url})` : `[${buttons.length}] ${btn.label}`;
      });
      lines.push('  ' + cells.join('   '));
    }
    return lines.join('\n');
  });

  return { output: blocks.join('\n\n'), buttons };
}

export async function startRepl(router: CommandRouter, services: ServiceContainer): Promise<void> {
  const userId = services.config.repl.userId;
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
    prompt: '\n> ',
  });

  console.log('\n🌤️ Weather bot is ready. Send a city or a /command, "#<n>" to press a button, "quit" to exit.\n');

  let lastButtons: Button[] = [];

  const handleLine = async (input: string): Promise<void> => {
    let replies: Reply[];

    const press = input.match(/^#(\d+)$/);
    if (press) {
      const btn = lastButtons[parseInt(press[1]) - 1];
      if (!btn) {
        console.log(`No button #${press[1]}.`);
        return;
      }
      if ('url' in btn) {
        console.log(btn.url);
        return;
      }
      replies = await router.handleCallback(userId, btn.callback);
    } else {
      replies = await router.handleMessage(userId, input);
    }

    const rendered = renderReplies(replies);
    lastButtons = rendered.buttons;
    if (rendered.output) console.log(`\n${rendered.output}`);
  };

  rl.prompt();

  rl.on('line', async (line) => {
    const input = line.trim();

    if (!input) {
      rl.prompt();
      return;
    }

    if (input === 'quit' || input === 'exit') {
      handleShutdown(rl);
      return;
    }

    try {
      await handleLine(input);
    } catch (err) {
      error('REPL error', { error: String(err) });
      console.log(`\nError: ${err}`);
    }

    rl.prompt();
  });

  rl.on('close', () => {
    info('Session ended');
    closeServices(services);
    process.exit(0);
  });

  // Handle Ctrl+C
  process.on('SIGINT', () => {
    handleShutdown(rl);
  });
}

function handleShutdown(rl: readline.Interface): void {
  console.log('\nGoodbye! 👋\n');
  rl.close();
}
