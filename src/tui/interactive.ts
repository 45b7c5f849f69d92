import terminalKit from 'terminal-kit';
import type { ModalInterpreter } from '../interpreter/interpreter.js';
import { renderFrame, type RenderOptions } from './render.js';
import { setCursorVisible, type Term } from './term-cursor.js';

export interface TuiOptions extends RenderOptions {
  interpreter: ModalInterpreter;
}

/**
 * Run the full-screen session until the interpreter asks to quit.
 * One key is resolved, applied and drawn before the next one is handled.
 */
export async function runInteractiveTui(options: TuiOptions): Promise<void> {
  const term: Term = terminalKit.terminal;
  const { interpreter } = options;
  let crashed: unknown = null;

  let resolveExit: (() => void) | null = null;
  const exitPromise = new Promise<void>((resolve) => {
    resolveExit = resolve;
  });

  const redraw = (): void => {
    renderFrame(term, interpreter.snapshot(), options);
  };

  const onKey = (name: string): void => {
    try {
      const result = interpreter.feed(name);
      if (result.status === 'quit') {
        resolveExit?.();
        return;
      }
      redraw();
    } catch (error) {
      // Not a recoverable calendar error: leave the session and let the CLI report it.
      crashed = error;
      resolveExit?.();
    }
  };

  const onResize = (): void => {
    redraw();
  };

  term.fullscreen(true);
  term.grabInput({ mouse: undefined });
  process.stdout.on('resize', onResize);
  term.on('key', onKey);

  try {
    redraw();
    await exitPromise;
  } finally {
    term.removeListener('key', onKey);
    process.stdout.removeListener('resize', onResize);
    term.grabInput(false);
    term.fullscreen(false);
    setCursorVisible(term, true);
    term.styleReset();
  }

  if (crashed !== null) {
    throw crashed;
  }
}
