/**
 * Process execution facade.
 */
export { getDefaultInteractiveSpawner } from './interactive-process.ts';

export type {
  InteractiveProcess,
  InteractiveSpawner,
  SpawnInteractiveOptions,
} from './interactive-process.ts';
