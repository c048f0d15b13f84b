import { describe, it, expect } from 'vitest';
import { EnemyType } from './types';
import type { Formation } from './types';
import { createEnemy } from './models/enemy';
import { createBullet } from './models/bullet';
import { moveBullets, moveFormation } from './movement';

describe('moveFormation', () => {
    it('moves every enemy with the shared direction and speed', () => {
        const enemies = [createEnemy(100, 100, 1, EnemyType.Standard), createEnemy(200, 150, 1, EnemyType.Standard)];
        const formation: Formation = { direction: 1, speed: 50 };

        expect(moveFormation(enemies, formation, 0.1)).toBe(false);
        expect(enemies.map(e => [e.x, e.y])).toEqual([[105, 100], [205, 150]]);
        expect(formation.direction).toBe(1);
    });

    it('reverses and drops the whole formation after crossing the right margin', () => {
        const enemies = [createEnemy(765, 100, 1, EnemyType.Standard), createEnemy(400, 150, 1, EnemyType.Standard)];
        const formation: Formation = { direction: 1, speed: 50 };

        expect(moveFormation(enemies, formation, 0.2)).toBe(true);
        expect(enemies.map(e => [e.x, e.y])).toEqual([[775, 120], [410, 170]]);
        expect(formation.direction).toBe(-1);
        expect(enemies.every(e => e.direction === -1)).toBe(true);
    });

    it('reverses after crossing the left margin', () => {
        const enemies = [createEnemy(35, 100, -1, EnemyType.Standard)];
        const formation: Formation = { direction: -1, speed: 50 };

        expect(moveFormation(enemies, formation, 0.2)).toBe(true);
        expect(enemies[0]).toMatchObject({ x: 25, y: 120, direction: 1 });
        expect(formation.direction).toBe(1);
    });

    it('does not reverse again while heading back inside', () => {
        const enemies = [createEnemy(775, 120, -1, EnemyType.Standard)];
        const formation: Formation = { direction: -1, speed: 50 };

        expect(moveFormation(enemies, formation, 0)).toBe(false);
        expect(enemies[0]).toMatchObject({ x: 775, y: 120 });
    });

    it('keeps an enemy exactly on the margin in formation', () => {
        const enemies = [createEnemy(770, 100, 1, EnemyType.Standard)];
        const formation: Formation = { direction: 1, speed: 50 };

        expect(moveFormation(enemies, formation, 0)).toBe(false);
    });

    it('handles an empty formation', () => {
        const formation: Formation = { direction: 1, speed: 50 };
        expect(moveFormation([], formation, 1)).toBe(false);
    });
});

describe('moveBullets', () => {
    it('moves bullets and culls the ones past the top', () => {
        const bullets = [createBullet(100, 100), createBullet(200, 10), createBullet(300, 400)];

        expect(moveBullets(bullets, 0.1)).toBe(1);
        expect(bullets).toEqual([{ x: 100, y: 50 }, { x: 300, y: 350 }]);
    });
});
