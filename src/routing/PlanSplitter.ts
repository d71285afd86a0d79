/**
 * @file Plan Splitter
 *
 * Heuristic multi-step detection for the deterministic fallback path.
 * Splits an utterance on connective words ("然后", "then", "after that")
 * and clause punctuation so each fragment can be rule-matched on its own.
 *
 * @module routing/PlanSplitter
 */

/**
 * Configuration for the PlanSplitter.
 */
export interface PlanSplitterConfig {
    /** Fragments shorter than this (in characters) are discarded. */
    minFragmentLength: number;
    /** Clauses at least this long count towards the multi-clause indicator. */
    minClauseLength: number;
}

export const PLAN_SPLITTER_DEFAULTS: PlanSplitterConfig = {
    minFragmentLength: 2,
    minClauseLength: 4
};

/**
 * Connectives. English "next" and "finally" only count at a clause start,
 * so "play the next track" stays one step.
 */
const CONNECTIVE_SOURCE: string =
    '然后|接着|随后|之后|最后|\\bafter that\\b|\\band then\\b|\\bthen\\b|(?:^|[,，;；。.!！?？]\\s*)(?:next|finally)\\b';

/** Clause punctuation. A period only splits when followed by space or end. */
const CLAUSE_DELIMITER: RegExp = /[\n,，;；。!！?？]|\.(?=\s|$)/;

const LEADING_FILLER: RegExp = /^(?:and\s+|并且|并|再|就)/i;

export class PlanSplitter {
    private readonly config: PlanSplitterConfig;

    constructor(config: Partial<PlanSplitterConfig> = {}) {
        this.config = { ...PLAN_SPLITTER_DEFAULTS, ...config };
    }

    /**
     * Whether the utterance looks like more than one task.
     */
    public multiStep_detect(text: string): boolean {
        if (new RegExp(CONNECTIVE_SOURCE, 'i').test(text)) {
            return true;
        }

        const clauses: string[] = text
            .split(CLAUSE_DELIMITER)
            .map((clause: string): string => clause.trim())
            .filter((clause: string): boolean => this.length_of(clause) >= this.config.minClauseLength);
        return clauses.length >= 2;
    }

    /**
     * Split an utterance into candidate step fragments, in order.
     */
    public fragments_split(text: string): string[] {
        const delimited: string = text.replace(new RegExp(CONNECTIVE_SOURCE, 'gi'), '\n');

        return delimited
            .split(CLAUSE_DELIMITER)
            .map((fragment: string): string => fragment.trim().replace(LEADING_FILLER, '').trim())
            .filter((fragment: string): boolean => this.length_of(fragment) >= this.config.minFragmentLength);
    }

    private length_of(text: string): number {
        return Array.from(text).length;
    }
}
