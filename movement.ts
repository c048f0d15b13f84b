import { DEFAULT_CONFIG, type GameConfig } from './constants';
import type { Bullet, Enemy, Formation } from './types';
import { updateEnemy } from './models/enemy';
import { isOutOfBounds, updateBullet } from './models/bullet';
import { compactInPlace } from './utils';

/**
 * Advances every enemy with the formation's shared direction and speed.
 *
 * The edge test runs once, after everyone has moved, against the post-move
 * positions. When any enemy is outside the margin it is heading towards, the
 * whole formation turns around and drops. Returns whether that happened this frame.
 */
export const moveFormation = (
    enemies: Enemy[],
    formation: Formation,
    deltaTime: number,
    config: GameConfig = DEFAULT_CONFIG,
): boolean => {
    for (const enemy of enemies) {
        enemy.direction = formation.direction;
        updateEnemy(enemy, formation.speed, deltaTime);
    }

    const minX = config.enemyLeftMargin;
    const maxX = config.screenWidth - config.enemyRightMargin;
    const hitEdge = formation.direction > 0
        ? enemies.some(enemy => enemy.x > maxX)
        : enemies.some(enemy => enemy.x < minX);
    if (!hitEdge) return false;

    formation.direction = -formation.direction;
    for (const enemy of enemies) {
        enemy.direction = formation.direction;
        enemy.y += config.enemyDropAmount;
    }
    return true;
};

// Returns how many bullets left the top of the field
export const moveBullets = (bullets: Bullet[], deltaTime: number, config: GameConfig = DEFAULT_CONFIG): number => {
    const outOfBounds = new Set<number>();
    bullets.forEach((bullet, index) => {
        updateBullet(bullet, deltaTime, config);
        if (isOutOfBounds(bullet)) outOfBounds.add(index);
    });
    return compactInPlace(bullets, outOfBounds);
};
