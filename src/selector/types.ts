import type { BackendServer } from "../backend/server.ts";

/** What a selector may know about the session it is routing. */
export type SelectionContext = {
	/** Client address as seen by the listener. */
	readonly ip: string;
};

/**
 * Backend selection strategy. One instance is shared by every connection for
 * the life of the process.
 */
export type ServerSelector = {
	/** Strategy name for log lines. */
	readonly name: string;
	/** Choose a backend for a new session. */
	readonly findServer: (context: SelectionContext) => Promise<BackendServer>;
	/** Sum of `players.online` over the pool; unreachable backends count as 0. */
	readonly getPlayerCount: () => Promise<number>;
};

export class SelectorError extends Error {
	constructor(message = "No servers available") {
		super(message);
		this.name = "SelectorError";
	}
}
