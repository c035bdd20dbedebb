import yargs from "yargs";

export interface SlashCommandDefinition {
  name: string;
  description: string;
  usage?: string;
}

export interface ParsedSlashArgs {
  positional: string[];
  options: Record<string, string | undefined>;
}

export const parseSlashInput = ({
  input,
}: {
  input: string;
}): { hasLeadingSlash: boolean; name: string; rest: string } => {
  const trimmed = input.trim();
  if (!trimmed.startsWith("/")) {
    return { hasLeadingSlash: false, name: "", rest: "" };
  }
  const withoutSlash = trimmed.slice(1);
  const match = withoutSlash.match(/^\s*([^\s]*)\s*(.*)$/);
  const name = match?.[1] ?? "";
  const rest = match?.[2] ?? "";
  return { hasLeadingSlash: true, name, rest };
};

/**
 * Parses the argument part of a slash command. Every option is a string and
 * positionals are never coerced to numbers, so waypoint names like `007`
 * survive intact. Unknown options throw.
 */
export const parseSlashArgs = ({
  args,
  options,
}: {
  args: string;
  options: readonly string[];
}): ParsedSlashArgs => {
  const tokens = args
    .trim()
    .split(/\s+/)
    .filter((token) => token.length > 0);
  const parsed = yargs(tokens)
    .parserConfiguration({ "parse-positional-numbers": false, "camel-case-expansion": false })
    .options(Object.fromEntries(options.map((option) => [option, { type: "string" as const }])))
    .help(false)
    .version(false)
    .strictOptions()
    .exitProcess(false)
    .fail((message, error) => {
      throw error ?? new Error(message);
    })
    .parseSync();
  const values: Record<string, string | undefined> = {};
  for (const option of options) {
    const value: unknown = parsed[option];
    values[option] = typeof value === "string" && value.length > 0 ? value : undefined;
  }
  return { positional: parsed._.map((value) => String(value)), options: values };
};

export const filterSlashCommands = <T extends SlashCommandDefinition>({
  commands,
  token,
}: {
  commands: T[];
  token: string;
}): { exact?: T; matches: T[] } => {
  const normalized = token.trim().toLowerCase();
  if (!normalized) {
    return { matches: commands };
  }
  const exact = commands.find((command) => command.name.toLowerCase() === normalized);
  const prefixMatches = commands.filter((command) =>
    command.name.toLowerCase().startsWith(normalized),
  );
  const matches = exact
    ? [exact, ...prefixMatches.filter((command) => command !== exact)]
    : prefixMatches;
  return { exact, matches };
};

export const formatSlashCommandList = ({
  commands,
}: {
  commands: SlashCommandDefinition[];
}): string[] => {
  return commands.map((command) => `${command.usage ?? `/${command.name}`} - ${command.description}`);
};
