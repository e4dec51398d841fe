// Hand-driven clock for retention, lease and grace-period tests.
export class ManualClock {
    constructor(private current: number = Date.parse('2024-05-01T12:00:00.000Z')) { }

    readonly now = (): number => this.current;

    readonly date = (): Date => new Date(this.current);

    advance(ms: number): void {
        this.current += ms;
    }

    set(iso: string): void {
        this.current = Date.parse(iso);
    }
}

export const HOUR = 60 * 60 * 1000;
