// SPDX-License-Identifier: MIT
// Circwait Strongly Connected Components
// Iterative Tarjan decomposition over an adjacency function

/** Adjacency lookup; must return successors in a stable order */
export type Successors = (nodeId: string) => readonly string[];

interface Frame {
	node: string;
	next: readonly string[];
	idx: number;
}

/**
 * Compute strongly connected components with Tarjan's algorithm.
 *
 * Uses an explicit frame stack instead of recursion so deep wait chains do
 * not exhaust the call stack. Components are returned with their members
 * sorted, ordered by their smallest member.
 */
export function stronglyConnectedComponents(
	nodes: readonly string[],
	successors: Successors,
): string[][] {
	const index = new Map<string, number>();
	const lowlink = new Map<string, number>();
	const onStack = new Set<string>();
	const stack: string[] = [];
	const components: string[][] = [];
	let counter = 0;

	const open = (node: string, frames: Frame[]): void => {
		index.set(node, counter);
		lowlink.set(node, counter);
		counter++;
		stack.push(node);
		onStack.add(node);
		frames.push({ node, next: successors(node), idx: 0 });
	};

	for (const root of nodes) {
		if (index.has(root)) continue;
		const frames: Frame[] = [];
		open(root, frames);

		while (frames.length > 0) {
			const frame = frames[frames.length - 1];
			if (!frame) break;
			const target = frame.next[frame.idx];
			if (target !== undefined) {
				frame.idx++;
				if (!index.has(target)) {
					open(target, frames);
				} else if (onStack.has(target)) {
					lowlink.set(frame.node, Math.min(low(lowlink, frame.node), low(index, target)));
				}
				continue;
			}

			frames.pop();
			const parent = frames[frames.length - 1];
			if (parent) {
				lowlink.set(parent.node, Math.min(low(lowlink, parent.node), low(lowlink, frame.node)));
			}
			if (low(lowlink, frame.node) === low(index, frame.node)) {
				components.push(popComponent(stack, onStack, frame.node));
			}
		}
	}

	return components
		.map((c) => c.sort())
		.sort((a, b) => compareIds(a[0] ?? "", b[0] ?? ""));
}

function low(map: Map<string, number>, node: string): number {
	return map.get(node) ?? Number.MAX_SAFE_INTEGER;
}

function popComponent(stack: string[], onStack: Set<string>, root: string): string[] {
	const component: string[] = [];
	for (;;) {
		const member = stack.pop();
		if (member === undefined) break;
		onStack.delete(member);
		component.push(member);
		if (member === root) break;
	}
	return component;
}

/**
 * A component is nontrivial when it can carry a cycle: more than one member,
 * or a single member with a self loop.
 */
export function isNontrivial(component: readonly string[], successors: Successors): boolean {
	if (component.length > 1) return true;
	const only = component[0];
	return only !== undefined && successors(only).includes(only);
}

export function compareIds(a: string, b: string): number {
	return a < b ? -1 : a > b ? 1 : 0;
}
