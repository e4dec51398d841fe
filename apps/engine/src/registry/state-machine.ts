import { taskState } from '@taskline/sdk';

// STARTED -> STARTED is the restart of an envelope redelivered after its lease expired.
const TRANSITIONS: Record<taskState, readonly taskState[]> = {
    [taskState.PENDING]: [taskState.STARTED],
    [taskState.STARTED]: [taskState.STARTED, taskState.SUCCESS, taskState.RETRY, taskState.FAILURE],
    [taskState.RETRY]: [taskState.STARTED],
    [taskState.SUCCESS]: [],
    [taskState.FAILURE]: [],
};

export function isTerminal(state: taskState): boolean {
    return state === taskState.SUCCESS || state === taskState.FAILURE;
}

export function canTransition(from: taskState, to: taskState): boolean {
    return TRANSITIONS[from].includes(to);
}
