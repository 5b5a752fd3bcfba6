import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { isAbsolute, join, resolve } from "node:path";
import { parse as parseYaml } from "yaml";
import { z } from "zod/v4";

export const HOME_DIR = ".habits";
export const CONFIG_FILE = "config.yaml";

const ConfigFileSchema = z.object({
  dataFile: z.string().min(1).optional(),
  export: z
    .object({
      dir: z.string().min(1).optional(),
    })
    .optional(),
});

export interface Config {
  /** Absolute path of the habit store */
  dataFile: string;
  /** Absolute directory relative export paths land in */
  exportDir: string;
}

export interface LoadedConfig {
  homeDir: string;
  config: Config;
  /** Problems found in config.yaml; defaults were used instead */
  warnings: string[];
}

export const DEFAULT_CONFIG_YAML = `# habitr configuration
dataFile: habits.json
export:
  dir: exports
`;

/**
 * Directory holding config.yaml and the data file. HABITR_HOME overrides
 * the default .habits/ under the working directory.
 */
export function resolveHomeDir(
  cwd: string,
  env: NodeJS.ProcessEnv = process.env
): string {
  const override = env.HABITR_HOME;
  return override ? resolve(cwd, override) : join(cwd, HOME_DIR);
}

function defaults(homeDir: string): Config {
  return {
    dataFile: join(homeDir, "habits.json"),
    exportDir: join(homeDir, "exports"),
  };
}

function inHome(homeDir: string, path: string): string {
  return isAbsolute(path) ? path : join(homeDir, path);
}

/**
 * Load config.yaml from `homeDir`. A missing file yields defaults; an
 * unreadable or invalid one yields defaults plus a warning.
 */
export async function loadConfig(homeDir: string): Promise<LoadedConfig> {
  const configPath = join(homeDir, CONFIG_FILE);
  const fallback = defaults(homeDir);

  if (!existsSync(configPath)) {
    return { homeDir, config: fallback, warnings: [] };
  }

  let data: unknown;
  try {
    data = parseYaml(await readFile(configPath, "utf-8"));
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    return {
      homeDir,
      config: fallback,
      warnings: [`${configPath}: ${message.split("\n")[0]}`],
    };
  }

  // An empty file parses to null
  const result = ConfigFileSchema.safeParse(data ?? {});
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${configPath}: ${issue.path.join(".") || "(root)"}: ${issue.message}`
    );
    return { homeDir, config: fallback, warnings: issues };
  }

  const parsed = result.data;
  return {
    homeDir,
    config: {
      dataFile: parsed.dataFile ? inHome(homeDir, parsed.dataFile) : fallback.dataFile,
      exportDir: parsed.export?.dir ? inHome(homeDir, parsed.export.dir) : fallback.exportDir,
    },
    warnings: [],
  };
}
