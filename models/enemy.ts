import { DEFAULT_CONFIG, type GameConfig } from '../constants';
import { EnemyType } from '../types';
import type { Enemy, EnemyStats } from '../types';

export const ENEMY_STATS: Readonly<Record<EnemyType, Readonly<EnemyStats>>> = {
    [EnemyType.Standard]: { maxHealth: 1, speedMultiplier: 1.0, points: 10 },
    [EnemyType.Fast]: { maxHealth: 1, speedMultiplier: 1.5, points: 20 },
    [EnemyType.Tank]: { maxHealth: 3, speedMultiplier: 0.7, points: 50 },
    [EnemyType.Swooper]: { maxHealth: 1, speedMultiplier: 1.0, points: 30 },
};

export const maxHealth = (type: EnemyType): number => ENEMY_STATS[type].maxHealth;

export const speedMultiplier = (type: EnemyType): number => ENEMY_STATS[type].speedMultiplier;

export const points = (type: EnemyType): number => ENEMY_STATS[type].points;

export const createEnemy = (x: number, y: number, direction: number, type: EnemyType): Enemy => ({
    x,
    y,
    direction,
    type,
    health: maxHealth(type),
});

/**
 * Removes one point of health, never going below zero.
 * Returns true when the enemy has no health left after the call, so calling it
 * on an already destroyed enemy is a no-op that still returns true.
 */
export const takeDamage = (enemy: Enemy): boolean => {
    if (enemy.health > 0) {
        enemy.health -= 1;
    }
    return enemy.health === 0;
};

export const isDestroyed = (enemy: Enemy): boolean => enemy.health === 0;

export const hasBreachedDefenderLine = (enemy: Enemy, config: GameConfig = DEFAULT_CONFIG): boolean =>
    enemy.y > config.screenHeight - config.defenderLine;

export const updateEnemy = (enemy: Enemy, baseSpeed: number, deltaTime: number): void => {
    enemy.x += enemy.direction * baseSpeed * speedMultiplier(enemy.type) * deltaTime;
};
