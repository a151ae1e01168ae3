export enum GenerationState {
  IDLE = "idle",
  ACCUMULATING = "accumulating",
  SEALING = "sealing",
}

const validTransitions: Record<GenerationState, GenerationState[]> = {
  [GenerationState.IDLE]: [GenerationState.ACCUMULATING],
  [GenerationState.ACCUMULATING]: [GenerationState.SEALING],
  [GenerationState.SEALING]: [GenerationState.IDLE],
};

export class GenerationStateValidator {
  public static isValidTransition(from: GenerationState, to: GenerationState): boolean {
    return validTransitions[from]?.includes(to) ?? false;
  }

  public static getAllowedTransitions(from: GenerationState): GenerationState[] {
    return validTransitions[from] ?? [];
  }
}
