/**
 * Packet codec driven by minecraft-data's protocol.json schemas.
 *
 * Decoding walks a cursor over one packet body; encoding appends chunks and
 * concatenates once at the end. Only the schema constructs used by the
 * handshake, status, login and configuration packets exist here. An unknown
 * construct fails the first time a packet needs it, so a codec for a whole
 * section can still be built.
 */

import { encodeVarInt, readVarInt } from "./varint.ts";

// ── Cursor and sink ──

export type WireReader = {
	readonly buffer: Buffer;
	offset: number;
	/** Consume exactly `count` bytes or throw a RangeError. */
	readonly take: (count: number) => Buffer;
};

export type WireWriter = {
	readonly put: (chunk: Buffer) => void;
	readonly bytes: () => Buffer;
};

export const createWireReader = (buffer: Buffer, offset = 0): WireReader => {
	const reader: WireReader = {
		buffer,
		offset,
		take: (count) => {
			const end = reader.offset + count;
			if (end > buffer.length) {
				throw new RangeError(
					`Need ${count} bytes at ${reader.offset}, packet has ${buffer.length}`,
				);
			}
			const slice = buffer.subarray(reader.offset, end);
			reader.offset = end;
			return slice;
		},
	};
	return reader;
};

export const createWireWriter = (): WireWriter => {
	const chunks: Buffer[] = [];
	return {
		put: (chunk) => {
			chunks.push(chunk);
		},
		bytes: () => Buffer.concat(chunks),
	};
};

// ── Types ──

/** Field values visible to `switch` lookups, innermost container first. */
export type Scope = {
	readonly values: Record<string, unknown>;
	readonly parent: Scope | null;
};

const ROOT_SCOPE: Scope = { values: {}, parent: null };

export type WireType = {
	readonly decode: (reader: WireReader, scope: Scope) => unknown;
	readonly encode: (value: unknown, writer: WireWriter, scope: Scope) => void;
};

export type TypeRegistry = {
	readonly resolve: (schema: unknown) => WireType;
};

/** Decode one value starting at `offset`; `end` is the first unread byte. */
export const decodeValue = (
	type: WireType,
	buffer: Buffer,
	offset = 0,
): { value: unknown; end: number } => {
	const reader = createWireReader(buffer, offset);
	const value = type.decode(reader, ROOT_SCOPE);
	return { value, end: reader.offset };
};

export const encodeValue = (type: WireType, value: unknown): Buffer => {
	const writer = createWireWriter();
	type.encode(value, writer, ROOT_SCOPE);
	return writer.bytes();
};

// ── Value checks ──

const isRecord = (v: unknown): v is Record<string, unknown> =>
	typeof v === "object" && v !== null && !Array.isArray(v);

const mismatch = (wanted: string, got: unknown): TypeError =>
	new TypeError(`Expected ${wanted}, got ${Array.isArray(got) ? "array" : typeof got}`);

const asNumber = (v: unknown): number => {
	if (typeof v !== "number") throw mismatch("number", v);
	return v;
};

const asBigInt = (v: unknown): bigint => {
	if (typeof v === "bigint") return v;
	if (typeof v === "number" && Number.isInteger(v)) return BigInt(v);
	throw mismatch("bigint", v);
};

const asString = (v: unknown): string => {
	if (typeof v !== "string") throw mismatch("string", v);
	return v;
};

const asBytes = (v: unknown): Buffer => {
	if (!Buffer.isBuffer(v)) throw mismatch("Buffer", v);
	return v;
};

const asList = (v: unknown): unknown[] => {
	if (!Array.isArray(v)) throw mismatch("array", v);
	return v;
};

const asRecord = (v: unknown): Record<string, unknown> => {
	if (!isRecord(v)) throw mismatch("object", v);
	return v;
};

// ── Leaf types ──

const scalar = (
	width: number,
	get: (bytes: Buffer) => unknown,
	set: (bytes: Buffer, value: unknown) => void,
): WireType => ({
	decode: (reader) => get(reader.take(width)),
	encode: (value, writer) => {
		const bytes = Buffer.alloc(width);
		set(bytes, value);
		writer.put(bytes);
	},
});

const VOID: WireType = {
	decode: () => undefined,
	encode: () => {},
};

const VARINT: WireType = {
	decode: (reader) => {
		const { value, size } = readVarInt(reader.buffer, reader.offset);
		reader.offset += size;
		return value;
	},
	encode: (value, writer) => writer.put(encodeVarInt(asNumber(value))),
};

const UUID_HEX = /^[0-9a-f]{32}$/i;

const UUID: WireType = {
	decode: (reader) => {
		const hex = reader.take(16).toString("hex");
		return [
			hex.slice(0, 8),
			hex.slice(8, 12),
			hex.slice(12, 16),
			hex.slice(16, 20),
			hex.slice(20),
		].join("-");
	},
	encode: (value, writer) => {
		const hex = asString(value).replaceAll("-", "");
		if (!UUID_HEX.test(hex)) throw new TypeError(`Invalid UUID: ${String(value)}`);
		writer.put(Buffer.from(hex, "hex"));
	},
};

const REST_BUFFER: WireType = {
	decode: (reader) => reader.take(reader.buffer.length - reader.offset),
	encode: (value, writer) => writer.put(asBytes(value)),
};

const LEAVES: ReadonlyMap<string, WireType> = new Map([
	["void", VOID],
	["bool", scalar(1, (b) => b[0] !== 0, (b, v) => b.writeUInt8(v ? 1 : 0))],
	["i8", scalar(1, (b) => b.readInt8(), (b, v) => b.writeInt8(asNumber(v)))],
	["u8", scalar(1, (b) => b.readUInt8(), (b, v) => b.writeUInt8(asNumber(v)))],
	["i16", scalar(2, (b) => b.readInt16BE(), (b, v) => b.writeInt16BE(asNumber(v)))],
	["u16", scalar(2, (b) => b.readUInt16BE(), (b, v) => b.writeUInt16BE(asNumber(v)))],
	["i32", scalar(4, (b) => b.readInt32BE(), (b, v) => b.writeInt32BE(asNumber(v)))],
	["u32", scalar(4, (b) => b.readUInt32BE(), (b, v) => b.writeUInt32BE(asNumber(v)))],
	["i64", scalar(8, (b) => b.readBigInt64BE(), (b, v) => b.writeBigInt64BE(asBigInt(v)))],
	["u64", scalar(8, (b) => b.readBigUInt64BE(), (b, v) => b.writeBigUInt64BE(asBigInt(v)))],
	["f32", scalar(4, (b) => b.readFloatBE(), (b, v) => b.writeFloatBE(asNumber(v)))],
	["f64", scalar(8, (b) => b.readDoubleBE(), (b, v) => b.writeDoubleBE(asNumber(v)))],
	["varint", VARINT],
	["UUID", UUID],
	["restBuffer", REST_BUFFER],
]);

// ── Schema constructs ──

type Resolve = (schema: unknown) => WireType;

// protocol.json is untyped: every construct validates its own parameters.
const param = (params: unknown, key: string): unknown =>
	isRecord(params) ? params[key] : undefined;

const lengthOf = (countType: WireType, reader: WireReader, scope: Scope): number => {
	const length = asNumber(countType.decode(reader, scope));
	if (length < 0) throw new RangeError(`Negative length prefix: ${length}`);
	return length;
};

type Length = {
	readonly read: (reader: WireReader, scope: Scope) => number;
	readonly write: (length: number, writer: WireWriter, scope: Scope) => void;
};

/** Either a `countType` read before the data or a fixed `count`. */
const counted = (resolve: Resolve, params: unknown): Length => {
	const count = param(params, "count");
	const countTypeName = param(params, "countType");
	if (typeof count === "number") {
		return {
			read: () => count,
			write: () => {},
		};
	}
	if (countTypeName === undefined) {
		throw new Error("Length-prefixed schema needs count or countType");
	}
	const countType = resolve(countTypeName);
	return {
		read: (reader, scope) => lengthOf(countType, reader, scope),
		write: (length, writer, scope) => countType.encode(length, writer, scope),
	};
};

const pstring = (resolve: Resolve, params: unknown): WireType => {
	const length = counted(resolve, params);
	return {
		decode: (reader, scope) =>
			reader.take(length.read(reader, scope)).toString("utf8"),
		encode: (value, writer, scope) => {
			const bytes = Buffer.from(asString(value), "utf8");
			length.write(bytes.length, writer, scope);
			writer.put(bytes);
		},
	};
};

const buffer = (resolve: Resolve, params: unknown): WireType => {
	const length = counted(resolve, params);
	return {
		decode: (reader, scope) => reader.take(length.read(reader, scope)),
		encode: (value, writer, scope) => {
			const bytes = asBytes(value);
			length.write(bytes.length, writer, scope);
			writer.put(bytes);
		},
	};
};

const container = (resolve: Resolve, params: unknown): WireType => {
	const fields = asList(params).map((raw) => {
		const field = asRecord(raw);
		return {
			name: typeof field.name === "string" ? field.name : null,
			anon: field.anon === true,
			type: resolve(field.type),
		};
	});
	return {
		decode: (reader, scope) => {
			const values: Record<string, unknown> = {};
			const inner: Scope = { values, parent: scope };
			for (const field of fields) {
				const value = field.type.decode(reader, inner);
				if (field.anon && isRecord(value)) Object.assign(values, value);
				else if (field.name !== null) values[field.name] = value;
			}
			return values;
		},
		encode: (value, writer, scope) => {
			const values = asRecord(value);
			const inner: Scope = { values, parent: scope };
			for (const field of fields) {
				if (field.anon) field.type.encode(values, writer, inner);
				else if (field.name !== null) {
					field.type.encode(values[field.name], writer, inner);
				}
			}
		},
	};
};

const array = (resolve: Resolve, params: unknown): WireType => {
	const length = counted(resolve, params);
	const element = resolve(param(params, "type"));
	return {
		decode: (reader, scope) =>
			Array.from({ length: length.read(reader, scope) }, () =>
				element.decode(reader, scope),
			),
		encode: (value, writer, scope) => {
			const items = asList(value);
			length.write(items.length, writer, scope);
			for (const item of items) element.encode(item, writer, scope);
		},
	};
};

const mappingKey = (key: string): number =>
	key.startsWith("0x") ? Number.parseInt(key.slice(2), 16) : Number(key);

const mapper = (resolve: Resolve, params: unknown): WireType => {
	const raw = asRecord(params);
	const inner = resolve(raw.type);
	const byValue = new Map<number, string>();
	const byName = new Map<string, number>();
	for (const [key, name] of Object.entries(asRecord(raw.mappings))) {
		byValue.set(mappingKey(key), asString(name));
		byName.set(asString(name), mappingKey(key));
	}
	return {
		decode: (reader, scope) => {
			const value = inner.decode(reader, scope);
			return (typeof value === "number" ? byValue.get(value) : undefined) ?? value;
		},
		encode: (value, writer, scope) =>
			inner.encode(
				typeof value === "string" ? (byName.get(value) ?? value) : value,
				writer,
				scope,
			),
	};
};

/** Follow a `compareTo` path such as "action" or "../flags/kind". */
const lookup = (path: string, scope: Scope): unknown => {
	let from = scope;
	let rest = path;
	while (rest.startsWith("../")) {
		rest = rest.slice(3);
		from = from.parent ?? from;
	}
	let current: unknown = from.values;
	for (const key of rest.split("/")) {
		current = isRecord(current) ? current[key] : undefined;
	}
	return current;
};

const switchOn = (resolve: Resolve, params: unknown): WireType => {
	const compareTo = asString(param(params, "compareTo"));
	const cases = new Map(
		Object.entries(asRecord(param(params, "fields"))).map(
			([key, schema]) => [key, resolve(schema)] as const,
		),
	);
	const fallbackSchema = param(params, "default");
	const fallback = fallbackSchema === undefined ? VOID : resolve(fallbackSchema);
	const pick = (scope: Scope): WireType =>
		cases.get(String(lookup(compareTo, scope))) ?? fallback;
	return {
		decode: (reader, scope) => pick(scope).decode(reader, scope),
		encode: (value, writer, scope) => pick(scope).encode(value, writer, scope),
	};
};

const option = (resolve: Resolve, params: unknown): WireType => {
	const inner = resolve(params);
	return {
		decode: (reader, scope) =>
			reader.take(1)[0] === 0 ? undefined : inner.decode(reader, scope),
		encode: (value, writer, scope) => {
			const present = value !== undefined && value !== null;
			writer.put(Buffer.of(present ? 1 : 0));
			if (present) inner.encode(value, writer, scope);
		},
	};
};

const CONSTRUCTS: ReadonlyMap<string, (resolve: Resolve, params: unknown) => WireType> =
	new Map([
		["pstring", pstring],
		["buffer", buffer],
		["container", container],
		["array", array],
		["mapper", mapper],
		["switch", switchOn],
		["option", option],
	]);

// ── Registry ──

/** Resolve schemas against one protocol.json `types` table. */
export const createTypeRegistry = (
	table: Record<string, unknown>,
): TypeRegistry => {
	const named = new Map<string, WireType>();

	// A named type builds on first use, so self-referencing schemas terminate.
	const deferred = (name: string): WireType => {
		let built: WireType | null = null;
		const target = () => (built ??= resolve(table[name]));
		return {
			decode: (reader, scope) => target().decode(reader, scope),
			encode: (value, writer, scope) => target().encode(value, writer, scope),
		};
	};

	const byName = (name: string): WireType => {
		const leaf = LEAVES.get(name);
		if (leaf) return leaf;
		const known = named.get(name);
		if (known) return known;
		const schema = table[name];
		if (schema === undefined || schema === "native") {
			throw new Error(`Unknown type: ${name}`);
		}
		const type = deferred(name);
		named.set(name, type);
		return type;
	};

	const resolve: Resolve = (schema) => {
		if (typeof schema === "string") return byName(schema);
		if (!Array.isArray(schema)) {
			throw new Error(`Invalid type schema: ${JSON.stringify(schema)}`);
		}
		const [construct, params] = schema;
		const build = typeof construct === "string" ? CONSTRUCTS.get(construct) : undefined;
		if (!build) throw new Error(`Unknown compound type: ${String(construct)}`);
		return build(resolve, params);
	};

	return { resolve };
};

// ── Packets ──

export type DecodedPacket = {
	readonly id: number;
	readonly name: string;
	readonly params: Record<string, unknown>;
};

export type PacketCodec = {
	readonly read: (body: Buffer) => DecodedPacket;
	readonly write: (name: string, params: Record<string, unknown>) => Buffer;
	readonly packetNames: ReadonlyMap<number, string>;
	readonly packetIds: ReadonlyMap<string, number>;
};

/** Pull the `params` of a `["container", [...]]` field by name. */
const fieldParams = (schema: unknown, field: string): unknown => {
	if (!Array.isArray(schema) || !Array.isArray(schema[1])) return undefined;
	const found = schema[1].find((f: unknown) => isRecord(f) && f.name === field);
	const type: unknown = isRecord(found) ? found.type : undefined;
	return Array.isArray(type) ? type[1] : undefined;
};

/**
 * Codec for one state and direction. The section's `packet` type is a
 * container of a `name` mapper (ids) and a `params` switch (bodies).
 */
export const createPacketCodec = (section: {
	types: Record<string, unknown>;
}): PacketCodec => {
	const registry = createTypeRegistry(section.types);
	const mappings = param(fieldParams(section.types.packet, "name"), "mappings");
	const bodies = param(fieldParams(section.types.packet, "params"), "fields");
	if (!isRecord(mappings) || !isRecord(bodies)) {
		throw new Error("protocol section has no packet mapper");
	}

	const packetNames = new Map<number, string>();
	const packetIds = new Map<string, number>();
	for (const [key, name] of Object.entries(mappings)) {
		if (typeof name !== "string") continue;
		packetNames.set(mappingKey(key), name);
		packetIds.set(name, mappingKey(key));
	}

	const bodyTypes = new Map<string, WireType>();
	const bodyType = (name: string): WireType => {
		const known = bodyTypes.get(name);
		if (known) return known;
		if (!(name in bodies)) throw new Error(`No type definition for packet: ${name}`);
		const type = registry.resolve(bodies[name]);
		bodyTypes.set(name, type);
		return type;
	};

	return {
		packetNames,
		packetIds,
		read: (body) => {
			const { value: id, size } = readVarInt(body, 0);
			const name = packetNames.get(id);
			if (name === undefined) {
				throw new Error(`Unknown packet ID: 0x${id.toString(16)}`);
			}
			const { value, end } = decodeValue(bodyType(name), body, size);
			if (end !== body.length) {
				throw new Error(`Packet ${name} has ${body.length - end} trailing bytes`);
			}
			return { id, name, params: asRecord(value) };
		},
		write: (name, params) => {
			const id = packetIds.get(name);
			if (id === undefined) throw new Error(`Unknown packet name: ${name}`);
			return Buffer.concat([encodeVarInt(id), encodeValue(bodyType(name), params)]);
		},
	};
};
