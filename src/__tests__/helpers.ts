/**
 * Shared fakes for player and session tests
 */

import { EventEmitter } from 'events';
import { PlayerLaunchFailedError } from '../errors';
import { PlayerChild, PlayerHandle, PlayerLauncher, SpawnPlayer } from '../player/types';
import { Display } from '../scheduler/types';

/** Stand-in for a ChildProcess; exits only when told to */
export class FakeChild extends EventEmitter implements PlayerChild {
  readonly pid: number;
  exitCode: number | null = null;
  signalCode: NodeJS.Signals | null = null;
  killCalls: Array<NodeJS.Signals | number | undefined> = [];
  killThrows = false;

  constructor(pid = 4242) {
    super();
    this.pid = pid;
  }

  kill(signal?: NodeJS.Signals | number): boolean {
    this.killCalls.push(signal);
    if (this.killThrows) throw new Error('kill EPERM');
    return true;
  }

  finish(code = 0): void {
    this.exitCode = code;
    this.emit('exit', code, null);
  }
}

export type SpawnBehaviour = 'spawn' | 'spawn-and-exit' | Error;

export interface SpawnRecord {
  file: string;
  args: readonly string[];
  child: FakeChild;
}

/** Spawn function whose children start (or fail) on the next microtask */
export function createFakeSpawner(behaviour: SpawnBehaviour = 'spawn') {
  const spawned: SpawnRecord[] = [];
  const spawn: SpawnPlayer = (file, args) => {
    const child = new FakeChild(4242 + spawned.length);
    spawned.push({ file, args, child });
    queueMicrotask(() => {
      if (behaviour instanceof Error) {
        child.emit('error', behaviour);
        return;
      }
      child.emit('spawn');
      if (behaviour === 'spawn-and-exit') child.finish(0);
    });
    return child;
  };
  return { spawn, spawned };
}

export function enoent(file: string): Error {
  return Object.assign(new Error(`spawn ${file} ENOENT`), { code: 'ENOENT' });
}

/** Handle of a player that has already finished */
export function finishedHandle(command: readonly string[]): PlayerHandle {
  return {
    command,
    isAlive: () => false,
    waitForExit: async () => 'exited',
    terminate: () => false,
  };
}

/** Launcher that records commands and never starts a real process */
export class FakeLauncher implements PlayerLauncher {
  launched: string[][] = [];
  private readonly fail: boolean;

  constructor(fail = false) {
    this.fail = fail;
  }

  async launch(command: readonly string[]): Promise<PlayerHandle> {
    this.launched.push([...command]);
    if (this.fail) {
      throw new PlayerLaunchFailedError(command, `spawn ${command[0]} ENOENT`);
    }
    return finishedHandle(command);
  }
}

export class RecordingDisplay implements Display {
  shows: string[] = [];
  notices: string[] = [];

  show(text: string): void {
    this.shows.push(text);
  }

  notice(text: string): void {
    this.notices.push(text);
  }
}
