import type { InputSnapshot } from './types';

const LEFT_KEYS = ['a', 'ArrowLeft'];
const RIGHT_KEYS = ['d', 'ArrowRight'];
const FIRE_KEYS = [' '];
const RESET_KEYS = ['r', 'Enter'];

const keyOf = (e: Event): string | null =>
    'key' in e && typeof e.key === 'string' ? e.key : null;

export class InputManager {
    public keys: Record<string, boolean> = {};
    private firePending = false;
    private resetPending = false;
    private target: EventTarget | null = null;

    private handleKeyDown = (e: Event) => {
        const key = keyOf(e);
        if (key !== null) this.press(key);
    };

    private handleKeyUp = (e: Event) => {
        const key = keyOf(e);
        if (key !== null) this.release(key);
    };

    constructor(target?: EventTarget) {
        if (target) this.attach(target);
    }

    public attach(target: EventTarget) {
        this.destroy();
        this.target = target;
        target.addEventListener('keydown', this.handleKeyDown);
        target.addEventListener('keyup', this.handleKeyUp);
    }

    public press(key: string) {
        // Auto-repeat keydowns arrive while the key is still held
        if (!this.isPressed(key)) {
            if (FIRE_KEYS.includes(key)) this.firePending = true;
            if (RESET_KEYS.includes(key)) this.resetPending = true;
        }
        this.keys[key] = true;
    }

    public release(key: string) {
        this.keys[key] = false;
    }

    public isPressed(key: string): boolean {
        return this.keys[key] || false;
    }

    /**
     * Reads the current input state. Fire and reset report true once per press
     * and are cleared by the read.
     */
    public snapshot(): InputSnapshot {
        const snapshot: InputSnapshot = {
            left: LEFT_KEYS.some(key => this.isPressed(key)),
            right: RIGHT_KEYS.some(key => this.isPressed(key)),
            fire: this.firePending,
            reset: this.resetPending,
        };
        this.firePending = false;
        this.resetPending = false;
        return snapshot;
    }

    public resetKeys() {
        this.keys = {};
        this.firePending = false;
        this.resetPending = false;
    }

    public destroy() {
        if (!this.target) return;
        this.target.removeEventListener('keydown', this.handleKeyDown);
        this.target.removeEventListener('keyup', this.handleKeyUp);
        this.target = null;
    }
}
