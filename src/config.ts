import { readFile, writeFile } from "node:fs/promises";
import { isAbsolute, join, resolve } from "node:path";
import { parse } from "yaml";
import { CONFIG_FILE_NAME, STATE_DIR_NAME } from "./constants.js";
import { getFleetdeckPaths } from "./paths.js";
import { getRuntimeOverrides } from "./runtime/overrides.js";
import type { OrphanPolicy } from "./tasks/dispatcher.js";

export const DEFAULT_SENTINEL = "default" as const;
type DefaultSentinel = typeof DEFAULT_SENTINEL;
type ConfigValue<T> = T | DefaultSentinel;

export interface FleetdeckConfig {
  dispatchIntervalMs: number;
  refreshIntervalMs: number;
  maxDispatchAttempts: number;
  orphanPolicy: OrphanPolicy;
  workcellsOnly: boolean;
  errorLogLimit: number;
  graphDir: string;
  graphFiles: Record<string, string>;
  inboundSocket: string;
  outboundSocket: string;
}

export interface FleetdeckConfigTemplate {
  dispatchIntervalMs: ConfigValue<number>;
  refreshIntervalMs: ConfigValue<number>;
  maxDispatchAttempts: ConfigValue<number>;
  orphanPolicy: ConfigValue<OrphanPolicy>;
  workcellsOnly: ConfigValue<boolean>;
  errorLogLimit: ConfigValue<number>;
  graphDir: ConfigValue<string>;
  graphFiles: ConfigValue<Record<string, string>>;
  inboundSocket: ConfigValue<string>;
  outboundSocket: ConfigValue<string>;
}

export const DEFAULT_CONFIG = {
  dispatchIntervalMs: 1000,
  refreshIntervalMs: 500,
  maxDispatchAttempts: 3,
  orphanPolicy: "dispatch",
  workcellsOnly: false,
  errorLogLimit: 50,
} as const satisfies Partial<FleetdeckConfig>;

export const CONFIG_KEYS = [
  "dispatchIntervalMs",
  "refreshIntervalMs",
  "maxDispatchAttempts",
  "orphanPolicy",
  "workcellsOnly",
  "errorLogLimit",
  "graphDir",
  "graphFiles",
  "inboundSocket",
  "outboundSocket",
] as const;

export type ConfigKey = (typeof CONFIG_KEYS)[number];

type ParsedConfig = Partial<Record<ConfigKey, unknown>>;

const escapeYamlString = ({ value }: { value: string }): string =>
  value.replace(/\\/g, "\\\\").replace(/"/g, '\\"');

const isDefaultSentinel = (value: unknown): value is DefaultSentinel =>
  typeof value === "string" && value.trim().toLowerCase() === DEFAULT_SENTINEL;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

// Counts and intervals: positive integers only.
const parseCountValue = ({ value }: { value: unknown }): number | undefined => {
  if (isDefaultSentinel(value)) {
    return undefined;
  }
  const parsed =
    typeof value === "number"
      ? value
      : typeof value === "string" && value.trim().length > 0
        ? Number(value.trim())
        : Number.NaN;
  return Number.isInteger(parsed) && parsed > 0 ? parsed : undefined;
};

const parseBooleanValue = ({ value }: { value: unknown }): boolean | undefined => {
  if (isDefaultSentinel(value)) {
    return undefined;
  }
  if (typeof value === "boolean") {
    return value;
  }
  if (typeof value === "string") {
    const trimmed = value.trim().toLowerCase();
    if (trimmed === "true") {
      return true;
    }
    if (trimmed === "false") {
      return false;
    }
  }
  return undefined;
};

const parseStringValue = ({ value }: { value: unknown }): string | undefined => {
  if (isDefaultSentinel(value)) {
    return undefined;
  }
  if (typeof value === "string") {
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : undefined;
  }
  return undefined;
};

const parseOrphanPolicy = ({ value }: { value: unknown }): OrphanPolicy | undefined => {
  const parsed = parseStringValue({ value })?.toLowerCase();
  return parsed === "dispatch" || parsed === "drop" ? parsed : undefined;
};

const parseGraphFiles = ({ value }: { value: unknown }): Record<string, string> | undefined => {
  if (!isRecord(value)) {
    return undefined;
  }
  const entries = Object.entries(value)
    .map(([fleetName, path]) => [fleetName.trim(), parseStringValue({ value: path })] as const)
    .filter((entry): entry is readonly [string, string] => entry[0].length > 0 && !!entry[1]);
  return entries.length > 0 ? Object.fromEntries(entries) : undefined;
};

const toTemplateValue = <T>({
  parsed,
  fallback,
}: {
  parsed: T | undefined;
  fallback?: T;
}): ConfigValue<T> => {
  if (parsed === undefined || parsed === fallback) {
    return DEFAULT_SENTINEL;
  }
  return parsed;
};

export const buildTemplateConfig = ({
  parsed,
}: {
  parsed: ParsedConfig | null;
}): FleetdeckConfigTemplate => ({
  dispatchIntervalMs: toTemplateValue({
    parsed: parseCountValue({ value: parsed?.dispatchIntervalMs }),
    fallback: DEFAULT_CONFIG.dispatchIntervalMs,
  }),
  refreshIntervalMs: toTemplateValue({
    parsed: parseCountValue({ value: parsed?.refreshIntervalMs }),
    fallback: DEFAULT_CONFIG.refreshIntervalMs,
  }),
  maxDispatchAttempts: toTemplateValue({
    parsed: parseCountValue({ value: parsed?.maxDispatchAttempts }),
    fallback: DEFAULT_CONFIG.maxDispatchAttempts,
  }),
  orphanPolicy: toTemplateValue<OrphanPolicy>({
    parsed: parseOrphanPolicy({ value: parsed?.orphanPolicy }),
    fallback: DEFAULT_CONFIG.orphanPolicy,
  }),
  workcellsOnly: toTemplateValue({
    parsed: parseBooleanValue({ value: parsed?.workcellsOnly }),
    fallback: DEFAULT_CONFIG.workcellsOnly,
  }),
  errorLogLimit: toTemplateValue({
    parsed: parseCountValue({ value: parsed?.errorLogLimit }),
    fallback: DEFAULT_CONFIG.errorLogLimit,
  }),
  graphDir: toTemplateValue({ parsed: parseStringValue({ value: parsed?.graphDir }) }),
  graphFiles: toTemplateValue({ parsed: parseGraphFiles({ value: parsed?.graphFiles }) }),
  inboundSocket: toTemplateValue({ parsed: parseStringValue({ value: parsed?.inboundSocket }) }),
  outboundSocket: toTemplateValue({ parsed: parseStringValue({ value: parsed?.outboundSocket }) }),
});

const formatConfigValue = ({ value }: { value: ConfigValue<number | boolean> }): string => {
  if (value === DEFAULT_SENTINEL) {
    return DEFAULT_SENTINEL;
  }
  return `${value}`;
};

const formatConfigString = ({ value }: { value: ConfigValue<string> }): string => {
  if (value === DEFAULT_SENTINEL) {
    return DEFAULT_SENTINEL;
  }
  return `"${escapeYamlString({ value })}"`;
};

const formatGraphFiles = ({ value }: { value: ConfigValue<Record<string, string>> }): string[] => {
  if (value === DEFAULT_SENTINEL) {
    return [`graphFiles: ${DEFAULT_SENTINEL}`];
  }
  return [
    "graphFiles:",
    ...Object.entries(value).map(
      ([fleetName, path]) =>
        `  "${escapeYamlString({ value: fleetName })}": "${escapeYamlString({ value: path })}"`,
    ),
  ];
};

export const formatConfigTemplate = ({ config }: { config: FleetdeckConfigTemplate }): string => {
  return [
    `# default: ${DEFAULT_CONFIG.dispatchIntervalMs}. Milliseconds between dispatch ticks.`,
    `dispatchIntervalMs: ${formatConfigValue({ value: config.dispatchIntervalMs })}`,
    "",
    `# default: ${DEFAULT_CONFIG.refreshIntervalMs}. Milliseconds between console redraws.`,
    `refreshIntervalMs: ${formatConfigValue({ value: config.refreshIntervalMs })}`,
    "",
    `# default: ${DEFAULT_CONFIG.maxDispatchAttempts}. Failed publishes before a task is dropped.`,
    `maxDispatchAttempts: ${formatConfigValue({ value: config.maxDispatchAttempts })}`,
    "",
    `# default: ${DEFAULT_CONFIG.orphanPolicy}. dispatch|drop tasks whose fleet stopped reporting.`,
    `orphanPolicy: ${formatConfigString({ value: config.orphanPolicy })}`,
    "",
    `# default: ${DEFAULT_CONFIG.workcellsOnly}. Only offer and accept workcell waypoints.`,
    `workcellsOnly: ${formatConfigValue({ value: config.workcellsOnly })}`,
    "",
    `# default: ${DEFAULT_CONFIG.errorLogLimit}. Dispatch errors kept for the console.`,
    `errorLogLimit: ${formatConfigValue({ value: config.errorLogLimit })}`,
    "",
    "# default: maps. Directory holding <fleet>.yaml navigation graphs.",
    `graphDir: ${formatConfigString({ value: config.graphDir })}`,
    "",
    "# default: none. Per-fleet navigation graph files, relative to graphDir.",
    ...formatGraphFiles({ value: config.graphFiles }),
    "",
    `# default: ${STATE_DIR_NAME}/console.sock. Socket fleet adapters report to.`,
    `inboundSocket: ${formatConfigString({ value: config.inboundSocket })}`,
    "",
    `# default: ${STATE_DIR_NAME}/dispatch.sock. Socket of the task dispatch backend.`,
    `outboundSocket: ${formatConfigString({ value: config.outboundSocket })}`,
    "",
  ].join("\n");
};

export const parseConfigFile = ({ raw }: { raw: string }): ParsedConfig | null => {
  if (!raw.trim()) {
    return null;
  }
  try {
    const parsed: unknown = parse(raw);
    return isRecord(parsed) ? parsed : null;
  } catch {
    return null;
  }
};

export const ensureGitignoreEntry = async ({
  root,
  entry,
}: {
  root: string;
  entry: string;
}): Promise<void> => {
  const gitignorePath = join(root, ".gitignore");
  let raw = "";
  try {
    raw = await readFile(gitignorePath, "utf-8");
  } catch (error) {
    const err = error as NodeJS.ErrnoException;
    if (err?.code !== "ENOENT") {
      throw error;
    }
  }
  const lines = raw.split(/\r?\n/).map((line) => line.trim());
  if (lines.includes(entry)) {
    return;
  }
  const separator = raw.length > 0 && !raw.endsWith("\n") ? "\n" : "";
  await writeFile(gitignorePath, `${raw}${separator}${entry}\n`, "utf-8");
};

export const ensureConfigFile = async ({ root }: { root: string }): Promise<void> => {
  const configPath = join(root, CONFIG_FILE_NAME);
  let raw: string | null = null;
  try {
    raw = await readFile(configPath, "utf-8");
  } catch (error) {
    const err = error as NodeJS.ErrnoException;
    if (err?.code !== "ENOENT") {
      throw error;
    }
  }
  const template = formatConfigTemplate({
    config: buildTemplateConfig({ parsed: raw === null ? null : parseConfigFile({ raw }) }),
  });
  if (raw !== template) {
    await writeFile(configPath, template, "utf-8");
  }
  await ensureGitignoreEntry({ root, entry: STATE_DIR_NAME });
};

const resolveFrom = ({ root, value }: { root: string; value: string }): string =>
  isAbsolute(value) ? value : resolve(root, value);

export const loadConfig = async ({ root }: { root: string }): Promise<FleetdeckConfig> => {
  const configPath = join(root, CONFIG_FILE_NAME);
  let parsed: ParsedConfig | null = null;
  try {
    parsed = parseConfigFile({ raw: await readFile(configPath, "utf-8") });
  } catch (error) {
    const err = error as NodeJS.ErrnoException;
    if (err?.code !== "ENOENT") {
      throw error;
    }
  }
  const paths = getFleetdeckPaths({ root });
  const overrides = getRuntimeOverrides();
  const graphDir = overrides.graphDir ?? parseStringValue({ value: parsed?.graphDir });
  const inboundSocket =
    overrides.inboundSocket ?? parseStringValue({ value: parsed?.inboundSocket });
  const outboundSocket =
    overrides.outboundSocket ?? parseStringValue({ value: parsed?.outboundSocket });
  return {
    dispatchIntervalMs:
      parseCountValue({ value: parsed?.dispatchIntervalMs }) ?? DEFAULT_CONFIG.dispatchIntervalMs,
    refreshIntervalMs:
      parseCountValue({ value: parsed?.refreshIntervalMs }) ?? DEFAULT_CONFIG.refreshIntervalMs,
    maxDispatchAttempts:
      parseCountValue({ value: parsed?.maxDispatchAttempts }) ?? DEFAULT_CONFIG.maxDispatchAttempts,
    orphanPolicy: parseOrphanPolicy({ value: parsed?.orphanPolicy }) ?? DEFAULT_CONFIG.orphanPolicy,
    workcellsOnly:
      parseBooleanValue({ value: parsed?.workcellsOnly }) ?? DEFAULT_CONFIG.workcellsOnly,
    errorLogLimit:
      parseCountValue({ value: parsed?.errorLogLimit }) ?? DEFAULT_CONFIG.errorLogLimit,
    graphDir: graphDir ? resolveFrom({ root, value: graphDir }) : paths.graphDir,
    graphFiles: parseGraphFiles({ value: parsed?.graphFiles }) ?? {},
    inboundSocket: inboundSocket ? resolveFrom({ root, value: inboundSocket }) : paths.inboundSocket,
    outboundSocket: outboundSocket
      ? resolveFrom({ root, value: outboundSocket })
      : paths.outboundSocket,
  } satisfies FleetdeckConfig;
};
