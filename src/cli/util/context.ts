import { ControlClient } from '../../client/controlClient';
import { AgentContext, createContext } from '../../core/context';
import { describeError } from '../../core/errors';
import { AgentConfig, loadConfig } from '../../daemon/config';
import { createLogger } from '../../daemon/worker';
import { error } from './output';

/**
 * Load config for a one-shot command. Exits on a configuration error.
 */
export function loadCliConfig(configPath?: string): AgentConfig {
	try {
		return loadConfig(configPath);
	} catch (err) {
		return error(describeError(err));
	}
}

/**
 * Context for commands that work on local state directly. Their log lines
 * go to the agent log file only.
 */
export function loadCliContext(configPath?: string): AgentContext {
	const config = loadCliConfig(configPath);
	return createContext(config, createLogger(config, false));
}

export function controlClientFor(config: AgentConfig, timeout?: number): ControlClient {
	return new ControlClient({ host: config.daemon.host, port: config.daemon.port, timeout });
}
