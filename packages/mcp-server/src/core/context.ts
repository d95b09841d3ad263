import type { NoteIndex } from './read/noteIndex.js';
import type { Workspace } from './workspace.js';

/**
 * State shared by tool handlers. The index is swapped wholesale on refresh,
 * so handlers read it through the getter on every call.
 */
export interface ServerContext {
  workspace: Workspace;
  getIndex: () => NoteIndex;
  setIndex: (index: NoteIndex) => void;
}
