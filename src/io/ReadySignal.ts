/**
 * One-shot readiness latch. Fires at most once; later calls to `fire` are
 * ignored. `wait` resolves immediately once fired.
 */
export class ReadySignal {
    private fired = false;
    private readonly promise: Promise<void>;
    private resolveFn: () => void = () => { };

    constructor() {
        this.promise = new Promise<void>((resolve) => {
            this.resolveFn = resolve;
        });
    }

    public get isFired(): boolean {
        return this.fired;
    }

    /**
     * @returns true if this call fired the signal
     */
    public fire(): boolean {
        if (this.fired) return false;
        this.fired = true;
        this.resolveFn();
        return true;
    }

    public wait(): Promise<void> {
        return this.promise;
    }
}
