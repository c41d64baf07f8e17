import { PlaybackMode, pickRandom } from '@loopcast/shared';
import type { PlaybackModeType, RandomSource } from '@loopcast/shared';
import { logger } from '../utils/logger.js';

const COMPONENT = 'VideoSelector';

/**
 * Selection state the selector reads and mutates. Owned by the controller.
 */
export interface SelectionState {
  playedSet: Set<string>;
  loopItemId: string | null;
}

/**
 * Pick the next item id.
 *
 * - Loop mode repeats a pinned id while it is still in the library.
 * - A one-item library always yields that item and leaves `playedSet` alone.
 * - Otherwise ids are drawn at random without repeat until every id has been
 *   drawn once; drawing the last unplayed id resets the rotation.
 * - Loop mode with nothing pinned pins whatever gets picked.
 */
export function selectNext(
  mode: PlaybackModeType,
  libraryIds: readonly string[],
  state: SelectionState,
  random: RandomSource
): string | null {
  if (libraryIds.length === 0) {
    return null;
  }

  if (mode === PlaybackMode.LOOP && state.loopItemId !== null) {
    if (libraryIds.includes(state.loopItemId)) {
      logger.debug(COMPONENT, 'Loop mode: replaying pinned item', { itemId: state.loopItemId });
      return state.loopItemId;
    }
    logger.debug(COMPONENT, 'Pinned loop item left the library', { itemId: state.loopItemId });
    state.loopItemId = null;
  }

  if (libraryIds.length === 1) {
    return pin(mode, state, libraryIds[0]);
  }

  if (libraryIds.every((id) => state.playedSet.has(id))) {
    logger.info(COMPONENT, 'All items played, resetting rotation');
    state.playedSet.clear();
  }

  let unplayed = libraryIds.filter((id) => !state.playedSet.has(id));
  if (unplayed.length === 0) {
    unplayed = [...libraryIds];
  }

  if (unplayed.length === 1) {
    // Last item of the rotation; the next call starts a fresh one
    state.playedSet.clear();
    return pin(mode, state, unplayed[0]);
  }

  const chosen = pickRandom(unplayed, random);
  if (chosen === undefined) {
    return null;
  }
  state.playedSet.add(chosen);
  logger.debug(COMPONENT, `Selected item (${unplayed.length} unplayed)`, { itemId: chosen });
  return pin(mode, state, chosen);
}

function pin(mode: PlaybackModeType, state: SelectionState, id: string): string {
  if (mode === PlaybackMode.LOOP && state.loopItemId === null) {
    state.loopItemId = id;
    logger.debug(COMPONENT, 'Pinned loop item', { itemId: id });
  }
  return id;
}
