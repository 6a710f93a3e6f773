/** Protocol states a router-side connection passes through. */
export const ProtocolState = {
	HANDSHAKING: "handshaking",
	STATUS: "status",
	LOGIN: "login",
	CONFIGURATION: "configuration",
} as const;

export type ProtocolState = (typeof ProtocolState)[keyof typeof ProtocolState];

/** Packet direction, named as in minecraft-data. */
export const Direction = {
	TO_CLIENT: "toClient",
	TO_SERVER: "toServer",
} as const;

export type Direction = (typeof Direction)[keyof typeof Direction];

/** `nextState` values carried by the handshake packet. */
export const HandshakeIntent = {
	STATUS: 1,
	LOGIN: 2,
	TRANSFER: 3,
} as const;

export type HandshakeIntent =
	(typeof HandshakeIntent)[keyof typeof HandshakeIntent];

/** Legal forward transitions; anything else is a protocol error. */
export const TRANSITIONS: Readonly<
	Record<ProtocolState, readonly ProtocolState[]>
> = {
	[ProtocolState.HANDSHAKING]: [ProtocolState.STATUS, ProtocolState.LOGIN],
	[ProtocolState.STATUS]: [],
	[ProtocolState.LOGIN]: [ProtocolState.CONFIGURATION],
	[ProtocolState.CONFIGURATION]: [],
};

export const canTransition = (
	from: ProtocolState,
	to: ProtocolState,
): boolean => TRANSITIONS[from].includes(to);

/** Map a handshake intent to the state it selects, or null for unknown values. */
export const stateForIntent = (intent: number): ProtocolState | null => {
	switch (intent) {
		case HandshakeIntent.STATUS:
			return ProtocolState.STATUS;
		case HandshakeIntent.LOGIN:
		case HandshakeIntent.TRANSFER:
			return ProtocolState.LOGIN;
		default:
			return null;
	}
};
