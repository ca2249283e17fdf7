// PURITY: CORE
// INVARIANT: Blocks are returned in file order; bodyLines keep absolute line numbers
// COMPLEXITY: O(n) where n = |lines|

import { match } from "ts-pattern";

import type { ScannedLine } from "./scan.js";

export type BlockKind =
	| "Resource"
	| "Data"
	| "Provider"
	| "Variable"
	| "Output"
	| "Locals"
	| "Terraform";

/**
 * A top-level declaration and its body, without the header and closing brace.
 *
 * @invariant Resource/Data carry both typeName and instanceName
 */
export interface Block {
	readonly kind: BlockKind;
	readonly typeName?: string;
	readonly instanceName?: string;
	readonly startLine: number;
	readonly bodyLines: readonly ScannedLine[];
}

export type BlockHeader = Omit<Block, "startLine" | "bodyLines">;

const LABEL = String.raw`(?:"([^"]+)"|'([^']+)'|([A-Za-z_][\w-]*))`;
const TYPED_HEADER = new RegExp(
	String.raw`^(resource|data)\s+${LABEL}\s+${LABEL}\s*\{`,
	"u",
);
const NAMED_HEADER = new RegExp(
	String.raw`^(provider|variable|output)\s+${LABEL}\s*\{`,
	"u",
);
const BARE_HEADER = /^(locals|terraform)\s*\{/u;

const label = (m: RegExpExecArray, first: number): string =>
	m[first] ?? m[first + 1] ?? m[first + 2] ?? "";

const typedHeader = (text: string): BlockHeader | null => {
	const m = TYPED_HEADER.exec(text);
	if (m === null) return null;
	return {
		kind: m[1] === "data" ? "Data" : "Resource",
		typeName: label(m, 2),
		instanceName: label(m, 5),
	};
};

const namedHeader = (text: string): BlockHeader | null => {
	const m = NAMED_HEADER.exec(text);
	if (m === null) return null;
	const name = label(m, 2);
	return match(m[1])
		.with("provider", (): BlockHeader => ({ kind: "Provider", typeName: name }))
		.with("variable", (): BlockHeader => ({ kind: "Variable", instanceName: name }))
		.otherwise((): BlockHeader => ({ kind: "Output", instanceName: name }));
};

const bareHeader = (text: string): BlockHeader | null => {
	const m = BARE_HEADER.exec(text);
	if (m === null) return null;
	return { kind: m[1] === "locals" ? "Locals" : "Terraform" };
};

/**
 * Recognizes a block header written at column 0.
 *
 * @pure true
 * @example
 * ```ts
 * matchBlockHeader('resource "aws_s3_bucket" "logs" {');
 * // { kind: "Resource", typeName: "aws_s3_bucket", instanceName: "logs" }
 * ```
 */
export function matchBlockHeader(text: string): BlockHeader | null {
	return typedHeader(text) ?? namedHeader(text) ?? bareHeader(text);
}

// Braces inside quoted strings are counted too.
const braceDelta = (line: ScannedLine): number => {
	if (line.suppressed || line.isComment) return 0;
	return line.text.split("{").length - line.text.split("}").length;
};

interface BodySlice {
	readonly body: readonly ScannedLine[];
	readonly next: number;
}

function sliceBody(lines: readonly ScannedLine[], headerIndex: number): BodySlice {
	const header = lines[headerIndex];
	if (header === undefined || header.text.includes("}")) {
		return { body: [], next: headerIndex + 1 };
	}
	const body: ScannedLine[] = [];
	let balance = 1;
	let index = headerIndex + 1;
	for (; index < lines.length && balance > 0; index++) {
		const line = lines[index];
		if (line === undefined) break;
		body.push(line);
		balance += braceDelta(line);
	}
	const last = body.at(-1);
	if (last !== undefined && last.text.trim() === "}") body.pop();
	return { body, next: index };
}

/**
 * Finds top-level blocks and slices their bodies by brace counting.
 *
 * A single-line block (`locals {}`) gets an empty body. Lines outside any
 * recognized block are not part of the result.
 *
 * @pure true
 * @complexity O(n)
 */
export function extractBlocks(lines: readonly ScannedLine[]): readonly Block[] {
	const blocks: Block[] = [];
	let index = 0;
	while (index < lines.length) {
		const line = lines[index];
		const header =
			line === undefined || line.suppressed ? null : matchBlockHeader(line.text);
		if (line === undefined || header === null) {
			index += 1;
			continue;
		}
		const { body, next } = sliceBody(lines, index);
		blocks.push({ ...header, startLine: line.lineNumber, bodyLines: body });
		index = next;
	}
	return blocks;
}

/**
 * Human-readable block label used in alignment messages.
 *
 * @pure true
 * @example
 * ```ts
 * blockLabel({ kind: "Resource", typeName: "aws_vpc", instanceName: "main", startLine: 1, bodyLines: [] });
 * // "resource.aws_vpc.main"
 * ```
 */
export function blockLabel(block: BlockHeader): string {
	const type = block.typeName ?? "";
	const name = block.instanceName ?? "";
	return match(block.kind)
		.with("Resource", () => `resource.${type}.${name}`)
		.with("Data", () => `data.${type}.${name}`)
		.with("Provider", () => `provider.${type}`)
		.with("Variable", () => `variable.${name}`)
		.with("Output", () => `output.${name}`)
		.with("Locals", () => "locals")
		.with("Terraform", () => "terraform")
		.exhaustive();
}
