export type {
	Connection,
	ConnectionOptions,
	ConnectionOutcome,
} from "./connection.ts";
export {
	createConnection,
	ProtocolError,
	TRANSFER_PROTOCOL_FLOOR,
} from "./connection.ts";
export type { Router, RouterOptions } from "./router.ts";
export { createRouter } from "./router.ts";
