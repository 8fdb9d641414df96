import { GenerationOutcome } from '../domain/entities/GenerationResult';
import { normalizePlatformName } from '../domain/entities/PlatformSpec';

/**
 * Per-session state for an interactive surface: what the user picked and what
 * was generated last. Passed explicitly to the orchestrator.
 */
export class GenerationSession {
    private readonly selected: string[];
    private lastOutcome: GenerationOutcome | null = null;

    constructor(
        selectedPlatforms: readonly string[],
        public language: string
    ) {
        this.selected = selectedPlatforms.map(normalizePlatformName);
    }

    get selectedPlatforms(): readonly string[] {
        return this.selected;
    }

    recordOutcome(outcome: GenerationOutcome): void {
        this.lastOutcome = outcome;
    }

    get lastGeneration(): GenerationOutcome | null {
        return this.lastOutcome;
    }
}
