import type { SortKey, StoreQuery } from '../core/interfaces.js';
import type { Note } from '../types/index.js';

export function cloneNote(note: Note): Note {
  return {
    ...note,
    createdAt: new Date(note.createdAt.getTime()),
    updatedAt: new Date(note.updatedAt.getTime()),
  };
}

function sortValue(note: Note, field: SortKey['field']): string | number {
  const value = note[field];
  return value instanceof Date ? value.getTime() : value;
}

function compareBy(a: Note, b: Note, key: SortKey): number {
  const l = sortValue(a, key.field);
  const r = sortValue(b, key.field);
  let order: number;
  if (typeof l === 'number' && typeof r === 'number') {
    order = l - r;
  } else {
    const ls = String(l);
    const rs = String(r);
    order = ls === rs ? 0 : ls < rs ? -1 : 1;
  }
  if (order === 0) return 0;
  return key.direction === 'asc' ? order : -order;
}

/**
 * Filter, sort and copy records. Shared by every NoteStore implementation.
 */
export function applyQuery(notes: Iterable<Note>, query: StoreQuery = {}): Note[] {
  const { filter, sort = [] } = query;
  const matches: Note[] = [];
  for (const note of notes) {
    if (!filter || filter(note)) {
      matches.push(cloneNote(note));
    }
  }

  if (sort.length > 0) {
    matches.sort((a, b) => {
      for (const key of sort) {
        const result = compareBy(a, b, key);
        if (result !== 0) return result;
      }
      return 0;
    });
  }

  return matches;
}
