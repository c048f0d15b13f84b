import { DEFAULT_CONFIG, SWOOPER_MIN_WAVE, type GameConfig } from './constants';
import { EnemyType } from './types';
import type { Enemy, Logger } from './types';
import { createEnemy } from './models/enemy';

const normalizeWave = (wave: number): number =>
    Number.isFinite(wave) ? Math.max(1, Math.floor(wave)) : 1;

export const rowsForWave = (wave: number, config: GameConfig = DEFAULT_CONFIG): number =>
    config.waveBaseRows + normalizeWave(wave);

/**
 * Picks the enemy type for a grid cell. Tanks lead the formation, fast enemies
 * sit behind them, and from SWOOPER_MIN_WAVE on the bottom row is made of swoopers.
 */
export const enemyTypeFor = (row: number, rows: number, wave: number): EnemyType => {
    if (row === 0) return EnemyType.Tank;
    if (row === 1) return EnemyType.Fast;
    if (wave >= SWOOPER_MIN_WAVE && row === rows - 1) return EnemyType.Swooper;
    return EnemyType.Standard;
};

/**
 * Builds the enemy grid for a wave: `waveBaseRows + wave` rows by `waveColumns`
 * columns, emitted column by column. Wave 1 therefore starts with
 * (50, 100), (50, 150), (50, 200), (110, 100)...
 */
export const generateWave = (wave: number, config: GameConfig = DEFAULT_CONFIG, logger?: Logger): Enemy[] => {
    const waveNumber = normalizeWave(wave);
    const rows = rowsForWave(waveNumber, config);
    const columns = config.waveColumns;

    logger?.(`Generating wave ${waveNumber} with ${rows * columns} enemies (${rows} rows x ${columns} columns)`);

    const enemies: Enemy[] = [];
    for (let col = 0; col < columns; col++) {
        for (let row = 0; row < rows; row++) {
            enemies.push(createEnemy(
                config.waveOrigin.x + col * config.waveSpacing.x,
                config.waveOrigin.y + row * config.waveSpacing.y,
                1,
                enemyTypeFor(row, rows, waveNumber),
            ));
        }
    }
    return enemies;
};

export const nextWaveSpeed = (speed: number, config: GameConfig = DEFAULT_CONFIG): number =>
    speed + config.enemySpeedIncrement;
