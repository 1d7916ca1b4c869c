import type { StateMachineConfig, TransitionListener } from "./types";

/** Finite lifecycle guard. Illegal transitions throw; listeners run after the state has changed. */
export class StateMachine<TState extends string> {
    private _current: TState;
    private readonly _transitions: Record<TState, readonly TState[]>;
    private readonly _name: string;
    private readonly _listeners: Set<TransitionListener<TState>> = new Set();

    constructor(config: StateMachineConfig<TState>) {
        this._current = config.initial;
        this._transitions = config.transitions;
        this._name = config.name ?? "StateMachine";
    }

    get current(): TState {
        return this._current;
    }

    is(state: TState): boolean {
        return this._current === state;
    }

    canTransition(target: TState): boolean {
        return this._transitions[this._current].includes(target);
    }

    transition(target: TState): void {
        if (!this.canTransition(target)) {
            throw new Error(`[typebus] illegal transition "${this._current}" → "${target}" for "${this._name}"`);
        }
        const from = this._current;
        this._current = target;
        for (const listener of this._listeners) {
            listener(from, target);
        }
    }

    onTransition(cb: TransitionListener<TState>): () => void {
        this._listeners.add(cb);
        return () => {
            this._listeners.delete(cb);
        };
    }
}
