export type EndpointErrorCode =
	| "InvalidHostPort"
	| "NoAddress"
	| "NoSrvAndNoFallback";

const MESSAGES: Readonly<Record<EndpointErrorCode, string>> = {
	InvalidHostPort: "Invalid host:port format",
	NoAddress: "No A/AAAA records found",
	NoSrvAndNoFallback: "SRV lookup not possible and no port given",
};

/** A resolution attempt failed for a reason of our own; DNS errors are rethrown as-is. */
export class EndpointError extends Error {
	readonly code: EndpointErrorCode;
	readonly input: string;

	constructor(code: EndpointErrorCode, input: string) {
		super(`${MESSAGES[code]}: ${input}`);
		this.name = "EndpointError";
		this.code = code;
		this.input = input;
	}
}

export const isEndpointError = (
	err: unknown,
	code?: EndpointErrorCode,
): err is EndpointError =>
	err instanceof EndpointError && (code === undefined || err.code === code);
