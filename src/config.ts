import { z } from "zod";
import { HarnessError } from "./errors.js";

export const ENV_BASE_URL = "SETTLECHECK_BASE_URL";

const ConfigSchema = z.object({
  baseUrl: z.string({ required_error: `base URL is required (--base-url or ${ENV_BASE_URL})` }).url(),
  cdpUrl: z.string().url().optional(),
  headless: z.boolean(),
  artifactsDir: z.string().min(1).optional(),
  concurrency: z.coerce.number().int().min(1).max(16),
  only: z.string().min(1).optional(),
  viewports: z.array(z.enum(["mobile", "desktop"])).min(1),
  defaultFilter: z.enum(["unread", "all"]),
  feedUrl: z.string().url().optional(),
});

export type HarnessConfig = z.infer<typeof ConfigSchema>;

export const USAGE = `Usage: settlecheck --base-url <url> [options]

  --base-url <url>          Reader under test (or ${ENV_BASE_URL})
  --cdp-url <url>           Attach to a running browser instead of launching one
  --headed                  Launch a visible browser
  --artifacts <dir>         Write failure artifacts here
  --concurrency <n>         Scenario runs in parallel (default 1)
  --only <name>             Run scenarios whose name contains <name>
  --viewport <class>        mobile or desktop (default: both)
  --default-filter <tab>    unread or all (default unread)
  --feed-url <url>          Fetchable feed; enables the duplicate-subscription check`;

const VALUE_FLAGS = new Set([
  "--base-url",
  "--cdp-url",
  "--artifacts",
  "--concurrency",
  "--only",
  "--viewport",
  "--default-filter",
  "--feed-url",
]);

/**
 * Build the run configuration from command-line flags, falling back to the
 * environment for the base URL. Throws CONFIG_INVALID on anything malformed.
 */
export function parseConfig(
  argv: readonly string[],
  env: Readonly<Record<string, string | undefined>> = process.env,
): HarnessConfig {
  const values = new Map<string, string>();
  let headless = true;

  for (let i = 0; i < argv.length; i++) {
    const flag = argv[i];
    if (flag === "--headed") {
      headless = false;
      continue;
    }
    if (!VALUE_FLAGS.has(flag)) {
      throw new HarnessError("CONFIG_INVALID", `Unknown option ${flag}\n\n${USAGE}`);
    }
    const value = argv[i + 1];
    if (value === undefined || value.startsWith("--")) {
      throw new HarnessError("CONFIG_INVALID", `${flag} needs a value`);
    }
    values.set(flag, value);
    i++;
  }

  const viewport = values.get("--viewport");
  const parsed = ConfigSchema.safeParse({
    baseUrl: values.get("--base-url") ?? env[ENV_BASE_URL],
    cdpUrl: values.get("--cdp-url"),
    headless,
    artifactsDir: values.get("--artifacts"),
    concurrency: values.get("--concurrency") ?? 1,
    only: values.get("--only"),
    viewports: viewport ? [viewport] : ["desktop", "mobile"],
    defaultFilter: values.get("--default-filter") ?? "unread",
    feedUrl: values.get("--feed-url"),
  });
  if (!parsed.success) {
    const message = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new HarnessError("CONFIG_INVALID", `Invalid configuration: ${message}`);
  }
  return parsed.data;
}
