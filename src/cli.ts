/**
 * CLI entry point for terminal-invaders
 *
 * Runs Invaders on the current terminal through the Node adapter.
 * Takes no flags; the color theme comes from INVADERS_THEME.
 */

import * as p from '@clack/prompts';
import { runInvadersGame, type InvadersController } from './games/invaders';
import { setTheme } from './games/utils';
import { getThemeModes, isValidThemeMode } from './themes';
import { createNodeTerminal, type NodeTerminal } from './terminal';

const THEME_ENV = 'INVADERS_THEME';

function applyTheme(requested: string | undefined) {
  if (!requested) return;
  if (isValidThemeMode(requested)) {
    setTheme(requested);
    return;
  }
  p.log.warn(`Unknown theme "${requested}", using cyan. Available: ${getThemeModes().join(', ')}`);
  setTheme('cyan');
}

function main() {
  applyTheme(process.env[THEME_ENV]);

  let terminal: NodeTerminal;
  try {
    terminal = createNodeTerminal(process.stdin, process.stdout);
  } catch (error) {
    p.log.error(error instanceof Error ? error.message : String(error));
    process.exit(1);
  }

  let controller: InvadersController | null = null;

  const shutdown = (code: number) => {
    controller?.stop();
    terminal.close();
    process.exit(code);
  };

  process.on('exit', () => terminal.close());
  process.on('SIGTERM', () => shutdown(0));
  process.on('SIGINT', () => shutdown(0));

  try {
    controller = runInvadersGame(terminal, {
      onQuit: ({ score, level, highScore }) => {
        terminal.close();
        p.outro(`Score ${score} · level ${level} · best ${highScore}`);
        process.exit(0);
      },
    });
  } catch (error) {
    terminal.close();
    p.log.error(error instanceof Error ? error.message : String(error));
    process.exit(1);
  }
}

main();
