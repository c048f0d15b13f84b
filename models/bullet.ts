import { DEFAULT_CONFIG, type GameConfig } from '../constants';
import type { Bullet } from '../types';

export const createBullet = (x: number, y: number): Bullet => ({ x, y });

// Bullets only travel upwards
export const updateBullet = (bullet: Bullet, deltaTime: number, config: GameConfig = DEFAULT_CONFIG): void => {
    bullet.y -= config.bulletSpeed * deltaTime;
};

export const isOutOfBounds = (bullet: Bullet): boolean => bullet.y < 0;
