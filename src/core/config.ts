/**
 * Configuration read from the environment
 *
 * Every variable is optional; CLI flags take precedence where both exist.
 */

import { z } from "zod";
import { ConfigError } from "./errors.js";
import { expandHome, splitList } from "./utils.js";
import { DEFAULT_TEST_COMMAND } from "./test-runner.js";

const configSchema = z.object({
  // LP_CREDENTIALS_FILE: launchpadlib credential store
  LP_CREDENTIALS_FILE: z.string().min(1).default("~/.lp_creds"),

  // LP_API_ROOT: Launchpad web service root, including the API version
  LP_API_ROOT: z.string().url("LP_API_ROOT must be a valid URL").default("https://api.launchpad.net/devel/"),

  // LP_MP_STATUSES: comma separated merge proposal statuses to offer
  LP_MP_STATUSES: z
    .string()
    .default("Needs review,Approved")
    .transform(splitList)
    .pipe(z.array(z.string()).min(1, "LP_MP_STATUSES must name at least one status")),

  // MP_TEST_COMMAND: command run by lpmptox
  MP_TEST_COMMAND: z.string().min(1).default(DEFAULT_TEST_COMMAND),

  // MP_TEST_LOG: file lpmptox appends its output to
  MP_TEST_LOG: z.string().min(1).optional(),

  // MP_LXC_IMAGE: image remote for isolated test runs
  MP_LXC_IMAGE: z.string().min(1).default("ubuntu"),
});

export interface AppConfig {
  credentialsFile: string;
  apiRoot: string;
  statuses: string[];
  testCommand: string;
  testLogFile?: string;
  lxcImage: string;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = configSchema.safeParse(env);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration: ${details}`);
  }
  const parsed = result.data;
  return {
    credentialsFile: expandHome(parsed.LP_CREDENTIALS_FILE),
    apiRoot: parsed.LP_API_ROOT.endsWith("/") ? parsed.LP_API_ROOT : `${parsed.LP_API_ROOT}/`,
    statuses: parsed.LP_MP_STATUSES,
    testCommand: parsed.MP_TEST_COMMAND,
    testLogFile: parsed.MP_TEST_LOG ? expandHome(parsed.MP_TEST_LOG) : undefined,
    lxcImage: parsed.MP_LXC_IMAGE,
  };
}
