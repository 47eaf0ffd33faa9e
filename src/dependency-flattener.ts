import { LibraryDependency } from './types';

interface Frame {
  readonly libraries: readonly LibraryDependency[];
  /** Index of the library being visited; the list is walked from the end. */
  index: number;
  /** Whether the current library's own dependencies were already handled. */
  expanded: boolean;
  /** Whether this frame marked the current library as in progress. */
  entered: boolean;
}

function frameFor(libraries: readonly LibraryDependency[]): Frame {
  return { libraries, index: libraries.length - 1, expanded: false, entered: false };
}

/**
 * Flattens a library graph into one list where earlier entries override the
 * resources of later ones.
 *
 * Direct dependencies are visited last to first. Each library's own
 * dependencies are flattened into the shared result before the library is
 * put at the front, unless it is already in the result, in which case it
 * keeps the position it got first. The first declared dependency ends up
 * at the head, with its transitive dependencies right behind it.
 *
 * Walks the graph with an explicit stack, so deep chains do not grow the
 * call stack. A library already in the result, or currently being
 * expanded, is not expanded again, which keeps shared subgraphs linear and
 * stops on cycles.
 */
export function flattenDependencies(direct: readonly LibraryDependency[]): LibraryDependency[] {
  // Built back to front, reversed at the end.
  const reversed: LibraryDependency[] = [];
  const seen = new Set<LibraryDependency>();
  const inProgress = new Set<LibraryDependency>();
  const stack: Frame[] = [frameFor(direct)];

  while (stack.length > 0) {
    const frame = stack[stack.length - 1];
    if (frame.index < 0) {
      stack.pop();
      continue;
    }

    const library = frame.libraries[frame.index];

    if (!frame.expanded) {
      frame.expanded = true;
      // A placed library already has its whole subtree placed behind it.
      if (library.dependencies.length > 0 && !seen.has(library) && !inProgress.has(library)) {
        inProgress.add(library);
        frame.entered = true;
        stack.push(frameFor(library.dependencies));
        continue;
      }
    }

    if (frame.entered) {
      inProgress.delete(library);
    }
    if (!seen.has(library)) {
      seen.add(library);
      reversed.push(library);
    }
    frame.index--;
    frame.expanded = false;
    frame.entered = false;
  }

  return reversed.reverse();
}
