import { sha256 } from '@noble/hashes/sha2.js';
import { Bytes } from '../utils/Bytes';

/*
 * Puzzles, solutions and conditions are binary trees whose leaves are byte strings (atoms).
 *
 * Wire form: 0xff introduces a pair (first, then rest); 0x80 is the empty atom; a single byte
 * <= 0x7f stands for itself; otherwise a size prefix whose count of leading one bits gives the
 * prefix length is followed by the atom bytes.
 *
 * Tree hash: sha256(0x01 || atom) for atoms, sha256(0x02 || hash(first) || hash(rest)) for pairs.
 */

const PAIR_MARKER = 0xff;
const EMPTY_ATOM = 0x80;
const MAX_SINGLE_BYTE = 0x7f;

/** Largest atom the four-byte size prefix can describe. */
const MAX_ATOM_SIZE = 0x8000000 - 1;

const OP_QUOTE = 1;
const OP_APPLY = 2;
const OP_CONS = 4;

/**
 * Minimal big-endian two's complement encoding. Zero is the empty atom.
 */
export function intToBytes(value: bigint): Uint8Array {
	if (value === 0n) return new Uint8Array(0);
	let len = 1;
	while (value < -(1n << BigInt(8 * len - 1)) || value >= 1n << BigInt(8 * len - 1)) len++;
	let x = value < 0n ? (1n << BigInt(8 * len)) + value : value;
	const out = new Uint8Array(len);
	for (let i = len - 1; i >= 0; i--) {
		out[i] = Number(x & 0xffn);
		x >>= 8n;
	}
	return out;
}

export function bytesToInt(bytes: Uint8Array): bigint {
	if (bytes.length === 0) return 0n;
	let x = 0n;
	for (const b of bytes) x = (x << 8n) | BigInt(b);
	if (bytes[0] & 0x80) x -= 1n << BigInt(8 * bytes.length);
	return x;
}

function encodeAtomPrefix(size: number): number[] {
	if (size < 0x40) return [0x80 | size];
	if (size < 0x2000) return [0xc0 | (size >> 8), size & 0xff];
	if (size < 0x100000) return [0xe0 | (size >> 16), (size >> 8) & 0xff, size & 0xff];
	if (size <= MAX_ATOM_SIZE) {
		return [0xf0 | (size >> 24), (size >> 16) & 0xff, (size >> 8) & 0xff, size & 0xff];
	}
	throw new Error(`Atom too large to serialize: ${size} bytes`);
}

export class Program {
	private cachedHash?: Uint8Array;

	private constructor(
		readonly atom: Uint8Array | null,
		readonly pair: readonly [Program, Program] | null,
	) {}

	static readonly NIL: Program = new Program(new Uint8Array(0), null);

	static fromAtom(bytes: Uint8Array): Program {
		return new Program(bytes.slice(), null);
	}

	static fromInt(value: bigint | number): Program {
		return Program.fromAtom(intToBytes(BigInt(value)));
	}

	static fromText(text: string): Program {
		return Program.fromAtom(Bytes.fromString(text));
	}

	static cons(first: Program, rest: Program): Program {
		return new Program(null, [first, rest]);
	}

	static fromList(items: Program[]): Program {
		return items.reduceRight((rest, item) => Program.cons(item, rest), Program.NIL);
	}

	static fromHex(hex: string): Program {
		return Program.deserialize(Bytes.fromHex(hex));
	}

	/**
	 * Parse a serialized program. The whole buffer must be consumed.
	 *
	 * @throws Error on truncated input or trailing bytes.
	 */
	static deserialize(bytes: Uint8Array): Program {
		let offset = 0;
		const next = (): number => {
			if (offset >= bytes.length) throw new Error('Unexpected end of program data');
			return bytes[offset++];
		};
		const parse = (): Program => {
			const b = next();
			if (b === PAIR_MARKER) {
				const first = parse();
				const rest = parse();
				return Program.cons(first, rest);
			}
			if (b === EMPTY_ATOM) return Program.NIL;
			if (b <= MAX_SINGLE_BYTE) return new Program(Uint8Array.of(b), null);
			let mask = 0x80;
			let prefixLength = 0;
			let size = b;
			while (size & mask) {
				prefixLength++;
				size &= 0xff ^ mask;
				mask >>= 1;
			}
			if (prefixLength > 4) throw new Error('Atom size prefix too long');
			for (let i = 1; i < prefixLength; i++) size = size * 256 + next();
			if (offset + size > bytes.length) throw new Error('Unexpected end of program data');
			const atom = bytes.slice(offset, offset + size);
			offset += size;
			return new Program(atom, null);
		};
		const program = parse();
		if (offset !== bytes.length) {
			throw new Error(`Trailing bytes after program: ${bytes.length - offset}`);
		}
		return program;
	}

	get isAtom(): boolean {
		return this.atom !== null;
	}

	get isNil(): boolean {
		return this.atom !== null && this.atom.length === 0;
	}

	first(): Program {
		if (!this.pair) throw new Error('Expected a pair, got an atom');
		return this.pair[0];
	}

	rest(): Program {
		if (!this.pair) throw new Error('Expected a pair, got an atom');
		return this.pair[1];
	}

	/**
	 * Items of a nil-terminated list.
	 *
	 * @throws Error if the program is not a proper list.
	 */
	toList(): Program[] {
		const items: Program[] = [];
		let cur: Program = this;
		while (cur.pair) {
			items.push(cur.pair[0]);
			cur = cur.pair[1];
		}
		if (!cur.isNil) throw new Error('Expected a nil-terminated list');
		return items;
	}

	asAtom(): Uint8Array {
		if (this.atom === null) throw new Error('Expected an atom, got a pair');
		return this.atom;
	}

	asInt(): bigint {
		return bytesToInt(this.asAtom());
	}

	serialize(): Uint8Array {
		const chunks: Uint8Array[] = [];
		const write = (p: Program) => {
			if (p.pair) {
				chunks.push(Uint8Array.of(PAIR_MARKER));
				write(p.pair[0]);
				write(p.pair[1]);
				return;
			}
			const atom = p.asAtom();
			if (atom.length === 0) chunks.push(Uint8Array.of(EMPTY_ATOM));
			else if (atom.length === 1 && atom[0] <= MAX_SINGLE_BYTE) chunks.push(atom);
			else chunks.push(Uint8Array.from(encodeAtomPrefix(atom.length)), atom);
		};
		write(this);
		return Bytes.concat(...chunks);
	}

	toHex(): string {
		return Bytes.toHex(this.serialize());
	}

	treeHash(): Uint8Array {
		if (!this.cachedHash) {
			this.cachedHash = this.pair
				? sha256(
						Bytes.concat(Uint8Array.of(2), this.pair[0].treeHash(), this.pair[1].treeHash()),
					)
				: sha256(Bytes.concat(Uint8Array.of(1), this.asAtom()));
		}
		return this.cachedHash.slice();
	}

	equals(other: Program): boolean {
		return Bytes.equals(this.treeHash(), other.treeHash());
	}
}

/**
 * Bind arguments into a module: `(a (q . mod) (c (q . arg1) (c (q . arg2) 1)))`.
 */
export function curry(mod: Program, args: Program[]): Program {
	const env = args.reduceRight(
		(rest, arg) =>
			Program.fromList([Program.fromInt(OP_CONS), Program.cons(Program.fromInt(OP_QUOTE), arg), rest]),
		Program.fromInt(1),
	);
	return Program.fromList([
		Program.fromInt(OP_APPLY),
		Program.cons(Program.fromInt(OP_QUOTE), mod),
		env,
	]);
}

/**
 * Reverse of {@link curry}. Returns `undefined` for programs that are not in curried form.
 */
export function uncurry(program: Program): { mod: Program; args: Program[] } | undefined {
	const isOp = (p: Program, op: number) => p.isAtom && p.asInt() === BigInt(op);
	try {
		const [apply, quotedMod, env, ...extra] = program.toList();
		if (extra.length || !apply || !quotedMod || !env) return undefined;
		if (!isOp(apply, OP_APPLY) || quotedMod.isAtom || !isOp(quotedMod.first(), OP_QUOTE)) {
			return undefined;
		}
		const args: Program[] = [];
		let cur = env;
		while (!cur.isAtom) {
			const [cons, quotedArg, rest, ...more] = cur.toList();
			if (more.length || !cons || !quotedArg || !rest) return undefined;
			if (!isOp(cons, OP_CONS) || quotedArg.isAtom || !isOp(quotedArg.first(), OP_QUOTE)) {
				return undefined;
			}
			args.push(quotedArg.rest());
			cur = rest;
		}
		if (!isOp(cur, 1)) return undefined;
		return { mod: quotedMod.rest(), args };
	} catch {
		return undefined;
	}
}
