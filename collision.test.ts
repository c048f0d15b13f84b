import { describe, it, expect, vi } from 'vitest';
import { EnemyType } from './types';
import { createEnemy } from './models/enemy';
import { createBullet } from './models/bullet';
import { checkCollision, processCollisions, resolveCollisions } from './collision';

describe('checkCollision', () => {
    const enemy = createEnemy(100, 200, 1, EnemyType.Standard);

    it('hits inside the collision radius', () => {
        expect(checkCollision(createBullet(105, 205), enemy)).toBe(true);
    });

    it('misses outside the collision radius', () => {
        expect(checkCollision(createBullet(150, 250), enemy)).toBe(false);
    });

    it('misses exactly on the radius', () => {
        expect(checkCollision(createBullet(120, 200), enemy)).toBe(false);
        expect(checkCollision(createBullet(120, 200), enemy, 21)).toBe(true);
    });
});

describe('processCollisions', () => {
    it('destroys the enemy a bullet hits and spends the bullet', () => {
        const enemies = [
            createEnemy(100, 200, 1, EnemyType.Standard),
            createEnemy(200, 200, 1, EnemyType.Standard),
            createEnemy(300, 200, 1, EnemyType.Standard),
        ];
        const bullets = [createBullet(105, 205)];

        const destroyed = processCollisions(enemies, bullets);

        expect(destroyed).toEqual([{ x: 100, y: 200, points: 10 }]);
        expect(enemies.map(e => e.x)).toEqual([200, 300]);
        expect(bullets).toHaveLength(0);
    });

    it('lets only one bullet resolve per enemy per frame', () => {
        const enemies = [createEnemy(100, 200, 1, EnemyType.Standard)];
        const bullets = [createBullet(95, 195), createBullet(105, 205)];

        const destroyed = processCollisions(enemies, bullets);

        expect(destroyed).toHaveLength(1);
        expect(enemies).toHaveLength(0);
        expect(bullets).toEqual([{ x: 105, y: 205 }]);
    });

    it('picks the earliest bullet when several are equally close', () => {
        const enemies = [createEnemy(100, 200, 1, EnemyType.Tank)];
        const bullets = [createBullet(90, 200), createBullet(110, 200)];

        processCollisions(enemies, bullets);

        expect(bullets).toEqual([{ x: 110, y: 200 }]);
        expect(enemies[0].health).toBe(2);
    });

    it('does not let a spent bullet hit a second enemy', () => {
        const enemies = [createEnemy(100, 200, 1, EnemyType.Standard), createEnemy(110, 200, 1, EnemyType.Standard)];
        const bullets = [createBullet(105, 200)];

        const destroyed = processCollisions(enemies, bullets);

        expect(destroyed).toEqual([{ x: 100, y: 200, points: 10 }]);
        expect(enemies.map(e => e.x)).toEqual([110]);
        expect(bullets).toHaveLength(0);
    });

    it('wears a tank down over three frames', () => {
        const enemies = [createEnemy(100, 200, 1, EnemyType.Tank)];
        const bullets = [createBullet(105, 205)];

        expect(processCollisions(enemies, bullets)).toEqual([]);
        expect(enemies[0].health).toBe(2);
        expect(bullets).toHaveLength(0);

        bullets.push(createBullet(105, 205));
        expect(processCollisions(enemies, bullets)).toEqual([]);
        expect(enemies[0].health).toBe(1);

        bullets.push(createBullet(105, 205));
        expect(processCollisions(enemies, bullets)).toEqual([{ x: 100, y: 200, points: 50 }]);
        expect(enemies).toHaveLength(0);
    });

    it('reports destructions in enemy order with per-type points', () => {
        const enemies = [
            createEnemy(100, 200, 1, EnemyType.Standard),
            createEnemy(200, 200, 1, EnemyType.Fast),
            createEnemy(300, 200, 1, EnemyType.Swooper),
        ];
        const bullets = [createBullet(305, 205), createBullet(205, 205), createBullet(105, 205)];

        expect(processCollisions(enemies, bullets).map(d => d.points)).toEqual([10, 20, 30]);
        expect(enemies).toHaveLength(0);
        expect(bullets).toHaveLength(0);
    });

    it('leaves everything alone when nothing overlaps', () => {
        const enemies = [createEnemy(100, 200, 1, EnemyType.Standard)];
        const bullets = [createBullet(200, 300)];

        expect(processCollisions(enemies, bullets)).toEqual([]);
        expect(enemies).toHaveLength(1);
        expect(bullets).toHaveLength(1);
    });

    it('accepts empty collections', () => {
        expect(processCollisions([], [])).toEqual([]);
    });
});

describe('resolveCollisions', () => {
    it('reports damaging and destroying hits', () => {
        const enemies = [createEnemy(100, 200, 1, EnemyType.Tank), createEnemy(300, 200, 1, EnemyType.Fast)];
        const bullets = [createBullet(100, 200), createBullet(300, 200), createBullet(500, 500)];

        const result = resolveCollisions(enemies, bullets);

        expect(result.hits).toEqual([
            { x: 100, y: 200, enemyType: EnemyType.Tank, remainingHealth: 2, destroyed: false },
            { x: 300, y: 200, enemyType: EnemyType.Fast, remainingHealth: 0, destroyed: true },
        ]);
        expect(result.destroyed).toEqual([{ x: 300, y: 200, points: 20 }]);
        expect(result.spentBullets).toBe(2);
        expect(bullets).toEqual([{ x: 500, y: 500 }]);
    });

    it('logs frames that destroyed enemies', () => {
        const logger = vi.fn();
        resolveCollisions([createEnemy(100, 200, 1, EnemyType.Standard)], [createBullet(100, 200)], 20, logger);
        expect(logger).toHaveBeenCalledWith('DEBUG: Destroyed 1 enemies and removed 1 bullets in collision check');
    });
});
