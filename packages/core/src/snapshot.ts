import { loadConfig, applyEnvOverrides } from "./config.js";
import { LogSession, type FromConfigOptions } from "./logSession.js";

/** Loads config and the configured log once, without starting the poll loop. */
export async function loadSnapshot(configPath?: string, options: Omit<FromConfigOptions, "configPath"> = {}): Promise<LogSession> {
  const config = applyEnvOverrides(await loadConfig(configPath));
  const session = await LogSession.fromConfig(config, { ...options, configPath });
  await session.open();
  return session;
}
