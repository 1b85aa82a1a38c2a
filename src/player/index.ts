export type { PlayerHandle, PlayerLauncher, PlayerChild, SpawnPlayer, ExitWaitResult } from './types';
export { PlayerProcess } from './player-process';
export type { PlayerExit } from './player-process';
export { ProcessSupervisor, spawnDetached } from './supervisor';
export { buildPlayerCommand, isKnownPlayer, DEFAULT_PLAYER } from './commands';
export { detectPlayer, findExecutable, PLAYER_PRIORITY } from './detect';
export type { ExecutableLookup } from './detect';
