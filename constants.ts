export const SCREEN_WIDTH = 800;
export const SCREEN_HEIGHT = 600;

export const PLAYER_WIDTH = 50;
export const PLAYER_SPEED = 350; // pixels per second
export const PLAYER_Y = SCREEN_HEIGHT - 50;

export const BULLET_SPEED = 500;
export const COLLISION_RADIUS = 20;

// Enemies below SCREEN_HEIGHT - DEFENDER_LINE end the game
export const DEFENDER_LINE = 100;

export const ENEMY_LEFT_MARGIN = 30;
export const ENEMY_RIGHT_MARGIN = 30;
export const ENEMY_DROP_AMOUNT = 20;
export const INITIAL_ENEMY_SPEED = 50;
export const ENEMY_SPEED_INCREMENT = 10;

export const WAVE_COLUMNS = 10;
export const WAVE_BASE_ROWS = 2;
export const WAVE_ORIGIN = { x: 50, y: 100 };
export const WAVE_SPACING = { x: 60, y: 50 };
// First wave whose bottom row is made of swoopers
export const SWOOPER_MIN_WAVE = 3;

export interface GameConfig {
    screenWidth: number;
    screenHeight: number;
    playerWidth: number;
    playerSpeed: number;
    playerY: number;
    bulletSpeed: number;
    collisionRadius: number;
    defenderLine: number;
    enemyLeftMargin: number;
    enemyRightMargin: number;
    enemyDropAmount: number;
    initialEnemySpeed: number;
    enemySpeedIncrement: number;
    waveColumns: number;
    waveBaseRows: number;
    waveOrigin: { x: number; y: number };
    waveSpacing: { x: number; y: number };
}

export const DEFAULT_CONFIG: Readonly<GameConfig> = Object.freeze({
    screenWidth: SCREEN_WIDTH,
    screenHeight: SCREEN_HEIGHT,
    playerWidth: PLAYER_WIDTH,
    playerSpeed: PLAYER_SPEED,
    playerY: PLAYER_Y,
    bulletSpeed: BULLET_SPEED,
    collisionRadius: COLLISION_RADIUS,
    defenderLine: DEFENDER_LINE,
    enemyLeftMargin: ENEMY_LEFT_MARGIN,
    enemyRightMargin: ENEMY_RIGHT_MARGIN,
    enemyDropAmount: ENEMY_DROP_AMOUNT,
    initialEnemySpeed: INITIAL_ENEMY_SPEED,
    enemySpeedIncrement: ENEMY_SPEED_INCREMENT,
    waveColumns: WAVE_COLUMNS,
    waveBaseRows: WAVE_BASE_ROWS,
    waveOrigin: WAVE_ORIGIN,
    waveSpacing: WAVE_SPACING,
});

export const createConfig = (overrides: Partial<GameConfig> = {}): Readonly<GameConfig> =>
    Object.freeze({ ...DEFAULT_CONFIG, ...overrides });
