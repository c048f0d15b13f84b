import type { GameEvent, Logger } from './types';

/**
 * Enum for sound effect keys to provide type safety and prevent magic strings.
 */
export enum SoundEffect {
    PlayerShoot = 'playerShoot',
    InvaderHit = 'invaderHit',
    InvaderKilled = 'invaderKilled',
    PlayerDeath = 'playerDeath',
}

/**
 * A map defining the file paths for each sound effect.
 */
export const soundFiles: Record<SoundEffect, string> = {
    [SoundEffect.PlayerShoot]: '/sounds/player-shoot.wav',
    [SoundEffect.InvaderHit]: '/sounds/invader-hit.wav',
    [SoundEffect.InvaderKilled]: '/sounds/invader-killed.wav',
    [SoundEffect.PlayerDeath]: '/sounds/player-death.wav',
};

export const soundForEvent = (event: GameEvent): SoundEffect | null => {
    switch (event.type) {
        case 'shotFired': return SoundEffect.PlayerShoot;
        case 'enemyDamaged': return SoundEffect.InvaderHit;
        case 'enemyDestroyed': return SoundEffect.InvaderKilled;
        case 'gameOver': return SoundEffect.PlayerDeath;
        default: return null;
    }
};

// Whatever actually makes noise on the host: Web Audio, a native mixer, a test spy
export type SoundPlayer = (key: SoundEffect, file: string) => void;

export class AudioManager {
    private player: SoundPlayer | null;
    private logger: Logger;

    constructor(player: SoundPlayer | null = null, logger: Logger = console.log) {
        this.player = player;
        this.logger = logger;
    }

    public setPlayer(player: SoundPlayer | null): void {
        this.player = player;
    }

    public handle(event: GameEvent): void {
        const key = soundForEvent(event);
        if (key) this.play(key);
    }

    public play(key: SoundEffect): void {
        if (!this.player) {
            this.logger(`WARN: Cannot play ${key}. No sound player attached.`);
            return;
        }

        // A broken audio device must never stop the simulation
        try {
            this.player(key, soundFiles[key]);
        } catch (e) {
            this.logger(`ERROR: Failed to play sound: ${key}. ${e}`);
        }
    }
}
