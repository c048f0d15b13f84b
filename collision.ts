import { vec2 } from 'gl-matrix';
import { COLLISION_RADIUS } from './constants';
import type { Bullet, DestroyedEnemy, Enemy, EnemyHit, Logger } from './types';
import { points, takeDamage } from './models/enemy';
import { compactInPlace } from './utils';

export type CollisionResult = {
    destroyed: DestroyedEnemy[];
    hits: EnemyHit[];
    spentBullets: number;
};

const bulletCenter = vec2.create();
const enemyCenter = vec2.create();

export const checkCollision = (bullet: Bullet, enemy: Enemy, radius: number = COLLISION_RADIUS): boolean => {
    vec2.set(bulletCenter, bullet.x, bullet.y);
    vec2.set(enemyCenter, enemy.x, enemy.y);
    return vec2.distance(bulletCenter, enemyCenter) < radius;
};

/**
 * Resolves every bullet/enemy overlap for one frame.
 *
 * Enemies are visited in collection order and each one is hit by at most one
 * bullet: the earliest live bullet in range. That bullet is spent whether or not
 * the enemy dies, so it cannot hit anything else this frame. Destroyed enemies
 * and spent bullets are then compacted out of both arrays in place.
 */
export const resolveCollisions = (
    enemies: Enemy[],
    bullets: Bullet[],
    radius: number = COLLISION_RADIUS,
    logger?: Logger,
): CollisionResult => {
    const destroyed: DestroyedEnemy[] = [];
    const hits: EnemyHit[] = [];
    const spent = new Set<number>();
    const dead = new Set<number>();

    enemies.forEach((enemy, enemyIndex) => {
        const bulletIndex = bullets.findIndex(
            (bullet, index) => !spent.has(index) && checkCollision(bullet, enemy, radius),
        );
        if (bulletIndex === -1) return;

        spent.add(bulletIndex);
        const wasDestroyed = takeDamage(enemy);
        hits.push({
            x: enemy.x,
            y: enemy.y,
            enemyType: enemy.type,
            remainingHealth: enemy.health,
            destroyed: wasDestroyed,
        });

        if (wasDestroyed) {
            destroyed.push({ x: enemy.x, y: enemy.y, points: points(enemy.type) });
            dead.add(enemyIndex);
        }
    });

    compactInPlace(enemies, dead);
    const spentBullets = compactInPlace(bullets, spent);

    if (destroyed.length > 0) {
        logger?.(`DEBUG: Destroyed ${destroyed.length} enemies and removed ${spentBullets} bullets in collision check`);
    }

    return { destroyed, hits, spentBullets };
};

// Positions and point values of the enemies destroyed this frame, in hit order
export const processCollisions = (enemies: Enemy[], bullets: Bullet[], radius: number = COLLISION_RADIUS): DestroyedEnemy[] =>
    resolveCollisions(enemies, bullets, radius).destroyed;
