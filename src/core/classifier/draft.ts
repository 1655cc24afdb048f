// CHANGE: Run-local buffers for one classification pass
// WHY: Appending to owned arrays keeps a pass linear in the number of tokens
// PURITY: CORE (mutation never escapes a single classifyWithTables call)
// INVARIANT: freeze copies every buffer once; later draft writes never reach a frozen state
// COMPLEXITY: O(|delta|) per apply, O(n) per freeze

import type {
	ClassificationFlags,
	ClassifierState,
	Diagnostic,
} from "../models.js";
import type { Accumulator, Delta } from "./actions.js";

type MutableFlags = { -readonly [K in keyof ClassificationFlags]: boolean };

export interface ClassifierDraft {
	readonly inputList: readonly string[];
	flags: MutableFlags;
	outputFilename: string | undefined;
	buffers: Record<Accumulator, string[]>;
	diagnostics: Diagnostic[];
}

const flagsOf = (state: ClassifierState): MutableFlags => ({
	isVerbose: state.isVerbose,
	isDependencyOnly: state.isDependencyOnly,
	isPreprocessOnly: state.isPreprocessOnly,
	isAssembleOnly: state.isAssembleOnly,
	isAssembly: state.isAssembly,
	isCompileOnly: state.isCompileOnly,
	isEmitLLVM: state.isEmitLLVM,
	isStandardIn: state.isStandardIn,
});

/**
 * Draft seeded from a state; every buffer is a fresh copy.
 *
 * @pure true
 */
export const draftFrom = (state: ClassifierState): ClassifierDraft => ({
	inputList: state.inputList,
	flags: flagsOf(state),
	outputFilename: state.outputFilename,
	buffers: {
		inputFiles: [...state.inputFiles],
		objectFiles: [...state.objectFiles],
		compileArgs: [...state.compileArgs],
		linkArgs: [...state.linkArgs],
		forbiddenArgs: [...state.forbiddenArgs],
	},
	diagnostics: [...state.diagnostics],
});

const pushAll = <T>(target: T[], values: readonly T[]): void => {
	for (const value of values) target.push(value);
};

export const record = (
	draft: ClassifierDraft,
	notes: readonly Diagnostic[],
): void => {
	pushAll(draft.diagnostics, notes);
};

/**
 * Apply one action's delta in place.
 */
export function applyDelta(draft: ClassifierDraft, delta: Delta): void {
	record(draft, delta.notes ?? []);
	Object.assign(draft.flags, delta.flags);
	if (delta.outputFilename !== undefined) {
		draft.outputFilename = delta.outputFilename;
	}
	for (const [key, values] of delta.appends ?? []) {
		pushAll(draft.buffers[key], values);
	}
}

/**
 * Snapshot the draft as an immutable state.
 *
 * @pure true
 */
export const freeze = (draft: ClassifierDraft): ClassifierState => ({
	inputList: draft.inputList,
	inputFiles: [...draft.buffers.inputFiles],
	objectFiles: [...draft.buffers.objectFiles],
	compileArgs: [...draft.buffers.compileArgs],
	linkArgs: [...draft.buffers.linkArgs],
	forbiddenArgs: [...draft.buffers.forbiddenArgs],
	outputFilename: draft.outputFilename,
	diagnostics: [...draft.diagnostics],
	...draft.flags,
});

/**
 * Replace the draft's contents with a state a caller handler returned.
 */
export function replaceWith(
	draft: ClassifierDraft,
	state: ClassifierState,
): void {
	const next = draftFrom(state);
	draft.flags = next.flags;
	draft.outputFilename = next.outputFilename;
	draft.buffers = next.buffers;
	draft.diagnostics = next.diagnostics;
}
