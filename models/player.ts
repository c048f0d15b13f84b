import { DEFAULT_CONFIG, type GameConfig } from '../constants';
import type { Player } from '../types';

export const createPlayer = (config: GameConfig = DEFAULT_CONFIG): Player => ({
    x: config.screenWidth / 2,
});

/**
 * Moves the player horizontally. Left is applied before right, so holding
 * both keys cancels out. The result is clamped to keep the whole ship on screen.
 */
export const movePlayer = (
    player: Player,
    left: boolean,
    right: boolean,
    deltaTime: number,
    config: GameConfig = DEFAULT_CONFIG,
): void => {
    let velocity = 0;
    if (left) velocity -= config.playerSpeed;
    if (right) velocity += config.playerSpeed;

    const halfWidth = config.playerWidth / 2;
    const nextX = player.x + velocity * deltaTime;
    player.x = Math.max(halfWidth, Math.min(config.screenWidth - halfWidth, nextX));
};
