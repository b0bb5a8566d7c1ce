import { Command } from "commander";
import { z } from "zod";
import { LOG_LEVELS } from "./logger.js";

// digits only, so "" and " " do not coerce to 0
const decimal = z
  .string()
  .trim()
  .regex(/^\d+$/, "expected a non-negative integer")
  .pipe(z.coerce.number().int());

export const ConfigSchema = z.object({
  port: decimal.pipe(z.number().max(65535)),
  host: z.string().min(1),
  dataFile: z.string().min(1),
  maxConnections: decimal,
  logLevel: z.enum(LOG_LEVELS),
});

export type ServerConfig = z.infer<typeof ConfigSchema>;

type RawOptions = Record<keyof ServerConfig, string>;

const kFlags: Record<keyof ServerConfig, string> = {
  port: "--port",
  host: "--host",
  dataFile: "--data-file",
  maxConnections: "--max-connections",
  logLevel: "--log-level",
};

function isConfigKey(key: unknown): key is keyof ServerConfig {
  return typeof key === "string" && Object.hasOwn(kFlags, key);
}

const DEFAULTS = {
  port: "8080",
  host: "0.0.0.0",
  dataFile: "data.json",
  maxConnections: "0",
  logLevel: "info",
} as const;

// an empty variable counts as unset
function envOr(value: string | undefined, fallback: string): string {
  return value === undefined || value === "" ? fallback : value;
}

export function buildProgram(env: NodeJS.ProcessEnv = process.env): Command {
  return new Command()
    .name("entry-store")
    .description("Serve an append-only entry collection over a minimal HTTP subset")
    .option("-p, --port <port>", "TCP port to listen on", envOr(env.ENTRY_STORE_PORT, DEFAULTS.port))
    .option("-H, --host <host>", "address to bind", envOr(env.ENTRY_STORE_HOST, DEFAULTS.host))
    .option("-f, --data-file <path>", "JSON file holding the collection", envOr(env.ENTRY_STORE_DATA_FILE, DEFAULTS.dataFile))
    .option(
      "-m, --max-connections <n>",
      "cap on concurrent connections, 0 for none",
      envOr(env.ENTRY_STORE_MAX_CONNECTIONS, DEFAULTS.maxConnections),
    )
    .option(
      "--log-level <level>",
      `one of ${LOG_LEVELS.join("|")}`,
      envOr(env.ENTRY_STORE_LOG_LEVEL, DEFAULTS.logLevel),
    );
}

/**
 * Parses user arguments (no node/script prefix) with environment fallbacks.
 * Invalid values raise a CommanderError naming the option.
 */
export function parseConfig(argv: readonly string[], env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const program: Command = buildProgram(env).exitOverride();
  program.parse([...argv], { from: "user" });

  const res = ConfigSchema.safeParse(program.opts<RawOptions>());
  if (!res.success) {
    const issue = res.error.issues[0];
    const key = issue.path[0];
    const flag = isConfigKey(key) ? kFlags[key] : String(key);
    return program.error(`error: invalid value for ${flag}: ${issue.message}`, {
      exitCode: 1,
      code: "entry-store.invalidOption",
    });
  }
  return res.data;
}
