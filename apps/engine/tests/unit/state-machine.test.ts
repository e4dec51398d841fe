import { taskState } from '@taskline/sdk';
import { canTransition, isTerminal } from '../../src/registry/state-machine';

describe('task state machine', () => {
    it('only leaves PENDING through STARTED', () => {
        expect(canTransition(taskState.PENDING, taskState.STARTED)).toBe(true);
        expect(canTransition(taskState.PENDING, taskState.SUCCESS)).toBe(false);
        expect(canTransition(taskState.PENDING, taskState.FAILURE)).toBe(false);
        expect(canTransition(taskState.PENDING, taskState.RETRY)).toBe(false);
    });

    it('settles STARTED into any outcome', () => {
        expect(canTransition(taskState.STARTED, taskState.SUCCESS)).toBe(true);
        expect(canTransition(taskState.STARTED, taskState.RETRY)).toBe(true);
        expect(canTransition(taskState.STARTED, taskState.FAILURE)).toBe(true);
    });

    it('allows restarting a redelivered STARTED task', () => {
        expect(canTransition(taskState.STARTED, taskState.STARTED)).toBe(true);
    });

    it('requires RETRY to go through STARTED again', () => {
        expect(canTransition(taskState.RETRY, taskState.STARTED)).toBe(true);
        expect(canTransition(taskState.RETRY, taskState.SUCCESS)).toBe(false);
        expect(canTransition(taskState.RETRY, taskState.FAILURE)).toBe(false);
    });

    it('never leaves a terminal state', () => {
        for (const terminal of [taskState.SUCCESS, taskState.FAILURE]) {
            expect(isTerminal(terminal)).toBe(true);
            for (const next of Object.values(taskState)) {
                expect(canTransition(terminal, next)).toBe(false);
            }
        }
    });

    it('treats PENDING, STARTED and RETRY as in progress', () => {
        expect(isTerminal(taskState.PENDING)).toBe(false);
        expect(isTerminal(taskState.STARTED)).toBe(false);
        expect(isTerminal(taskState.RETRY)).toBe(false);
    });
});
