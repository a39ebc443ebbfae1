// ─── Agent Context ───────────────────────────────────────────────────────────

import { AgentConfig } from '../daemon/config';
import { Logger } from '../daemon/log';

/**
 * Handed to every component at construction. There is no process-wide
 * logger or config; whatever a component needs it reads from here.
 */
export interface AgentContext {
	readonly config: AgentConfig;
	readonly logger: Logger;
}

export function createContext(config: AgentConfig, logger: Logger): AgentContext {
	return { config, logger };
}
