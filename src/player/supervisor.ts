/**
 * Process Supervisor
 *
 * Launches the audio player as a detached child with every stdio stream
 * ignored. Detached means Ctrl-C in the terminal reaches only this process;
 * the session then stops the player itself, exactly once.
 */

import { spawn } from 'child_process';
import { PlayerLaunchFailedError } from '../errors';
import { getLogger } from '../logger';
import { PlayerProcess } from './player-process';
import { PlayerChild, PlayerLauncher, SpawnPlayer } from './types';

const log = getLogger('Supervisor');

export const spawnDetached: SpawnPlayer = (file, args) =>
  spawn(file, [...args], {
    detached: true,
    stdio: 'ignore',
    windowsHide: true,
  });

export class ProcessSupervisor implements PlayerLauncher {
  private readonly spawnPlayer: SpawnPlayer;

  constructor(spawnPlayer: SpawnPlayer = spawnDetached) {
    this.spawnPlayer = spawnPlayer;
  }

  /**
   * Start `command` and resolve once the OS reports it running.
   * Rejects with PlayerLaunchFailedError when it cannot be started.
   */
  launch(command: readonly string[]): Promise<PlayerProcess> {
    const [file, ...args] = command;
    if (!file) {
      return Promise.reject(new PlayerLaunchFailedError(command, 'empty command'));
    }

    return new Promise<PlayerProcess>((resolve, reject) => {
      let child: PlayerChild;
      try {
        child = this.spawnPlayer(file, args);
      } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        reject(new PlayerLaunchFailedError(command, reason, { cause: err }));
        return;
      }

      const onSpawn = (): void => {
        child.removeListener('error', onError);
        log.debug({ pid: child.pid, command }, 'Player started');
        resolve(new PlayerProcess(child, command));
      };

      const onError = (err: Error): void => {
        child.removeListener('spawn', onSpawn);
        reject(new PlayerLaunchFailedError(command, err.message, { cause: err }));
      };

      child.once('spawn', onSpawn);
      child.once('error', onError);
    });
  }
}
