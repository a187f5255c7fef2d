import fs from "node:fs";

import { formatErr, logger } from "./logger.js";

type Env = Record<string, string | undefined>;

// `NAME` from the environment, or the contents of the file named by `NAME_FILE`
// (container secret mounts)
export function readSecret(name: string, env: Env = process.env): string | null {
  const direct = env[name]?.trim();
  if (direct) {
    return direct;
  }

  const file = env[`${name}_FILE`]?.trim();
  if (!file) {
    return null;
  }

  try {
    const value = fs.readFileSync(file, "utf8").trim();
    return value || null;
  } catch (e) {
    logger.warn(`Unable to read secret file for ${name}`, { file, ...formatErr(e) }, "config");
    return null;
  }
}
