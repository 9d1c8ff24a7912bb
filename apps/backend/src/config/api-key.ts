import { existsSync, readFileSync } from "fs";
import { Logger } from "@nestjs/common";

const logger = new Logger("ApiKey");

/**
 * PowerDNS API key from `POWERDNS_API_KEY_FILE` (a mounted secret, trimmed)
 * or, when that is unset, from `POWERDNS_API_KEY`. An unreadable key file
 * yields no key rather than falling through to the plain variable.
 */
export function readPowerDnsApiKey(
  env: NodeJS.ProcessEnv = process.env,
): string | undefined {
  const keyFile = env.POWERDNS_API_KEY_FILE?.trim();

  if (keyFile) {
    if (!existsSync(keyFile)) {
      logger.error(`POWERDNS_API_KEY_FILE points to "${keyFile}", which does not exist.`);
      return undefined;
    }
    try {
      const key = readFileSync(keyFile, "utf-8").trim();
      return key || undefined;
    } catch (error) {
      logger.error(
        `Cannot read POWERDNS_API_KEY_FILE: ${error instanceof Error ? error.message : String(error)}`,
      );
      return undefined;
    }
  }

  const key = env.POWERDNS_API_KEY?.trim();
  if (!key) {
    logger.warn(
      "No PowerDNS API key configured via POWERDNS_API_KEY or POWERDNS_API_KEY_FILE; the API will reject requests.",
    );
    return undefined;
  }
  return key;
}
