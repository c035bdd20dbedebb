import { readFile, writeFile } from "node:fs/promises";

interface CommandHistoryFile {
  entries: string[];
  updatedAt: string;
}

export interface CommandHistory {
  /** Oldest first. */
  list: () => string[];
  record: ({ entry }: { entry: string }) => Promise<void>;
}

/** Trims, drops blanks and keeps only the latest use of a repeated command. */
export const normalizeHistoryEntries = ({
  entries,
  maxEntries,
}: {
  entries: string[];
  maxEntries: number;
}): string[] => {
  const latest: string[] = [];
  for (const entry of entries.map((value) => value.trim())) {
    if (entry.length === 0) {
      continue;
    }
    const previous = latest.indexOf(entry);
    if (previous >= 0) {
      latest.splice(previous, 1);
    }
    latest.push(entry);
  }
  return latest.slice(Math.max(0, latest.length - maxEntries));
};

export const parseCommandHistory = ({
  raw,
  maxEntries,
}: {
  raw: string;
  maxEntries: number;
}): string[] => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return [];
  }
  const entries: unknown =
    parsed && typeof parsed === "object" ? Reflect.get(parsed, "entries") : undefined;
  if (!Array.isArray(entries)) {
    return [];
  }
  return normalizeHistoryEntries({
    entries: entries.filter((entry): entry is string => typeof entry === "string"),
    maxEntries,
  });
};

const readHistoryFile = async ({ path }: { path: string }): Promise<string | null> => {
  try {
    return await readFile(path, "utf-8");
  } catch (error) {
    const err = error as NodeJS.ErrnoException;
    if (err?.code === "ENOENT") {
      return null;
    }
    throw error;
  }
};

/**
 * Slash commands entered in the console, persisted as JSON so the up and down
 * keys can recall them across sessions.
 */
export const loadCommandHistory = async ({
  path,
  maxEntries,
  now = () => Date.now(),
}: {
  path: string;
  maxEntries: number;
  now?: () => number;
}): Promise<CommandHistory> => {
  const raw = await readHistoryFile({ path });
  let entries = raw === null ? [] : parseCommandHistory({ raw, maxEntries });

  return {
    list: () => [...entries],
    record: async ({ entry }) => {
      entries = normalizeHistoryEntries({ entries: [...entries, entry], maxEntries });
      const file: CommandHistoryFile = {
        entries,
        updatedAt: new Date(now()).toISOString(),
      };
      await writeFile(path, JSON.stringify(file, null, 2), "utf-8");
    },
  };
};
