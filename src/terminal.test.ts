import { EventEmitter } from 'node:events';
import { describe, it, expect, vi } from 'vitest';
import { createNodeTerminal, SYNC_END, SYNC_START, type TerminalInput } from './terminal';

class FakeStdin extends EventEmitter implements TerminalInput {
  isTTY = true;
  rawMode = false;
  paused = true;

  setRawMode(mode: boolean) {
    this.rawMode = mode;
    return this;
  }

  setEncoding() {
    return this;
  }

  resume() {
    this.paused = false;
    return this;
  }

  pause() {
    this.paused = true;
    return this;
  }
}

function createFakeStdout(columns?: number, rows?: number) {
  const chunks: string[] = [];
  return {
    chunks,
    stream: {
      columns,
      rows,
      write: (data: string) => {
        chunks.push(data);
        return true;
      },
    },
  };
}

describe('createNodeTerminal', () => {
  it('refuses a stdin that is not a TTY', () => {
    const stdin = new FakeStdin();
    stdin.isTTY = false;
    expect(() => createNodeTerminal(stdin, createFakeStdout().stream)).toThrow('not a TTY');
  });

  it('switches stdin to raw mode', () => {
    const stdin = new FakeStdin();
    createNodeTerminal(stdin, createFakeStdout().stream);
    expect(stdin.rawMode).toBe(true);
    expect(stdin.paused).toBe(false);
  });

  it('reports the output size, defaulting to 80x24', () => {
    const sized = createNodeTerminal(new FakeStdin(), createFakeStdout(120, 40).stream);
    expect([sized.cols, sized.rows]).toEqual([120, 40]);

    const unsized = createNodeTerminal(new FakeStdin(), createFakeStdout().stream);
    expect([unsized.cols, unsized.rows]).toEqual([80, 24]);
  });

  it('wraps writes in synchronized output markers', () => {
    const stdout = createFakeStdout();
    const terminal = createNodeTerminal(new FakeStdin(), stdout.stream);
    terminal.write('frame');
    expect(stdout.chunks).toEqual([`${SYNC_START}frame${SYNC_END}`]);
  });

  it('delivers parsed keys to listeners until disposed', () => {
    const stdin = new FakeStdin();
    const terminal = createNodeTerminal(stdin, createFakeStdout().stream);
    const listener = vi.fn();
    const subscription = terminal.onKey(listener);

    stdin.emit('data', '\x1b[D');
    stdin.emit('data', '\x03');
    subscription.dispose();
    stdin.emit('data', ' ');

    expect(listener.mock.calls).toEqual([
      [{ key: 'ArrowLeft', domEvent: { key: 'ArrowLeft' } }],
      [{ key: 'q', domEvent: { key: 'q' } }],
    ]);
  });

  it('restores the terminal once on close', () => {
    const stdin = new FakeStdin();
    const stdout = createFakeStdout();
    const terminal = createNodeTerminal(stdin, stdout.stream);
    const listener = vi.fn();
    terminal.onKey(listener);

    terminal.close();
    terminal.close();
    stdin.emit('data', 'a');
    terminal.write('late');

    expect(stdin.rawMode).toBe(false);
    expect(stdin.paused).toBe(true);
    expect(stdin.listenerCount('data')).toBe(0);
    expect(listener).not.toHaveBeenCalled();
    expect(stdout.chunks).toEqual(['\x1b[?1049l', '\x1b[?25h', '\x1b[0m']);
  });
});
