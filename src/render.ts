import type { DescriptionNode, EvaluationResult, Status } from "./types.ts";

export interface RenderOptions {
	/** Spaces per nesting level. */
	readonly indent: number;
	readonly passedMarker: string;
	readonly failedMarker: string;
}

export const DEFAULT_RENDER_OPTIONS: RenderOptions = {
	indent: 3,
	passedMarker: "[✓] ",
	failedMarker: "[✗] ",
};

function marker(status: Status, options: RenderOptions): string {
	switch (status) {
		case "passed":
			return options.passedMarker;
		case "failed":
			return options.failedMarker;
		case "unknown":
			return "";
	}
}

function renderNode(node: DescriptionNode, level: number, options: RenderOptions): string {
	const pad = " ".repeat(level * options.indent);
	const head = `${pad}${marker(node.status, options)}${node.label}`;

	const detail = node.status === "failed" && node.detail ? ` ${node.detail}` : "";

	// an empty group renders like a leaf
	if (node.children.length === 0) return `${head}${detail}`;

	const body = node.children.map((child) => renderNode(child, level + 1, options)).join(",\n");
	return `${head}:[\n${body}\n${pad}]${detail}`;
}

/**
 * Render a diagnostic tree as indented text.
 *
 *   [✗] customer:[
 *      [✓] first name: 'John',
 *      [✗] town: 'London' but was: 'Manchester'
 *   ]
 *
 * Pure function of the tree: nothing is re-evaluated.
 */
export function renderDescription(
	node: DescriptionNode,
	options: Partial<RenderOptions> = {},
): string {
	return renderNode(node, 0, { ...DEFAULT_RENDER_OPTIONS, ...options });
}

export function renderResult(
	result: EvaluationResult,
	options: Partial<RenderOptions> = {},
): string {
	return renderDescription(result.node, options);
}
