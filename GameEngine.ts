import { createConfig, type GameConfig } from './constants';
import { GameState } from './types';
import type { GameEvent, InputSnapshot, Logger, RenderSnapshot, SimulationState, TickResult } from './types';
import { createBullet } from './models/bullet';
import { hasBreachedDefenderLine, points } from './models/enemy';
import { createPlayer, movePlayer } from './models/player';
import { moveBullets, moveFormation } from './movement';
import { resolveCollisions } from './collision';
import { generateWave, nextWaveSpeed } from './waves';
import { sanitizeDeltaTime } from './utils';
import type { AudioManager } from './audio';

export type GameEventListener = (event: GameEvent) => void;

export interface GameEngineOptions {
    config?: Partial<GameConfig>;
    logger?: Logger;
    audioManager?: AudioManager;
}

export const createInitialState = (config: GameConfig, logger?: Logger): SimulationState => ({
    player: createPlayer(config),
    enemies: generateWave(1, config, logger),
    bullets: [],
    formation: { direction: 1, speed: config.initialEnemySpeed },
    wave: 1,
    score: 0,
    gameState: GameState.Playing,
});

/**
 * Owns the simulation state for one session and advances it one frame per `tick`.
 *
 * Frame order: reset, fire, player, formation (move, then edge and drop),
 * defender line, bullets (move, then cull), collisions and score, and finally
 * either game over or wave progression. A breach recorded this frame wins over a
 * cleared wave.
 */
export class GameEngine {
    public readonly config: Readonly<GameConfig>;
    public state: SimulationState;

    private listeners = new Set<GameEventListener>();
    private audioManager?: AudioManager;
    private logger: Logger;

    constructor(options: GameEngineOptions = {}) {
        this.config = createConfig(options.config);
        this.logger = options.logger ?? console.log;
        this.audioManager = options.audioManager;
        this.state = createInitialState(this.config, this.logger);
    }

    public setAudioManager(audioManager: AudioManager) {
        this.audioManager = audioManager;
    }

    public onEvent(listener: GameEventListener): () => void {
        this.listeners.add(listener);
        return () => {
            this.listeners.delete(listener);
        };
    }

    public tick(input: InputSnapshot, deltaTime: number): TickResult {
        const events: GameEvent[] = [];

        if (this.state.gameState === GameState.GameOver) {
            if (input.reset) this.resetInto(events);
            return this.finish(events);
        }

        const dt = sanitizeDeltaTime(deltaTime);
        const { config, state } = this;

        if (input.fire) this.fireInto(events);

        movePlayer(state.player, input.left, input.right, dt, config);
        moveFormation(state.enemies, state.formation, dt, config);
        const breached = state.enemies.some(enemy => hasBreachedDefenderLine(enemy, config));

        moveBullets(state.bullets, dt, config);

        const { destroyed, hits } = resolveCollisions(state.enemies, state.bullets, config.collisionRadius, this.logger);
        for (const hit of hits) {
            events.push(hit.destroyed
                ? { type: 'enemyDestroyed', x: hit.x, y: hit.y, enemyType: hit.enemyType, points: points(hit.enemyType) }
                : { type: 'enemyDamaged', x: hit.x, y: hit.y, enemyType: hit.enemyType, remainingHealth: hit.remainingHealth });
        }
        state.score += destroyed.reduce((sum, enemy) => sum + enemy.points, 0);

        if (breached) {
            state.gameState = GameState.GameOver;
            this.logger(`Game over on wave ${state.wave} with final score ${state.score}`);
            events.push({ type: 'gameOver', finalScore: state.score, wave: state.wave });
        } else if (state.enemies.length === 0) {
            this.advanceWave(events);
        }

        return this.finish(events);
    }

    /**
     * Spawns a bullet at the player's position. Ignored outside the Playing state.
     */
    public fire(): boolean {
        const events: GameEvent[] = [];
        const fired = this.fireInto(events);
        this.dispatch(events);
        return fired;
    }

    public reset() {
        const events: GameEvent[] = [];
        this.resetInto(events);
        this.dispatch(events);
    }

    public getSnapshot(): RenderSnapshot {
        const { player, enemies, bullets, score, wave, gameState } = this.state;
        return {
            player: { x: player.x },
            enemies: enemies.map(({ x, y, type, health }) => ({ x, y, type, health })),
            bullets: bullets.map(({ x, y }) => ({ x, y })),
            score,
            wave,
            gameState,
        };
    }

    private fireInto(events: GameEvent[]): boolean {
        if (this.state.gameState !== GameState.Playing) return false;

        const bullet = createBullet(this.state.player.x, this.config.playerY);
        this.state.bullets.push(bullet);
        events.push({ type: 'shotFired', x: bullet.x, y: bullet.y });
        return true;
    }

    private resetInto(events: GameEvent[]) {
        this.logger('Resetting game to wave 1');
        this.state = createInitialState(this.config, this.logger);
        events.push({ type: 'reset' });
        events.push({
            type: 'waveStarted',
            wave: this.state.wave,
            enemyCount: this.state.enemies.length,
            speed: this.state.formation.speed,
        });
    }

    private advanceWave(events: GameEvent[]) {
        const { state } = this;
        events.push({ type: 'waveCleared', wave: state.wave });

        state.wave += 1;
        state.enemies = generateWave(state.wave, this.config, this.logger);
        state.formation.direction = 1;
        state.formation.speed = nextWaveSpeed(state.formation.speed, this.config);

        events.push({
            type: 'waveStarted',
            wave: state.wave,
            enemyCount: state.enemies.length,
            speed: state.formation.speed,
        });
    }

    private finish(events: GameEvent[]): TickResult {
        this.dispatch(events);
        return { events, snapshot: this.getSnapshot() };
    }

    // Collaborators may fail; the simulation carries on regardless
    private dispatch(events: GameEvent[]) {
        for (const event of events) {
            this.audioManager?.handle(event);
            for (const listener of this.listeners) {
                try {
                    listener(event);
                } catch (e) {
                    this.logger(`ERROR: Event listener failed on ${event.type}. ${e}`);
                }
            }
        }
    }
}
