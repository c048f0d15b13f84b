import React from 'react';
import { PLAYER_WIDTH, PLAYER_Y, SCREEN_HEIGHT, SCREEN_WIDTH } from '../constants';
import { EnemyType, GameState } from '../types';
import type { Bullet, Player, RenderSnapshot } from '../types';

const PLAYER_HEIGHT = 20;
const ENEMY_SIZE = { width: 40, height: 30 };
const BULLET_SIZE = { width: 4, height: 12 };

// Entities are positioned by their centre
const box = (x: number, y: number, width: number, height: number): React.CSSProperties => ({
  position: 'absolute',
  left: `${x - width / 2}px`,
  top: `${y - height / 2}px`,
  width: `${width}px`,
  height: `${height}px`,
});

interface PlayerProps {
  player: Readonly<Player>;
}

export const PlayerComponent: React.FC<PlayerProps> = ({ player }) => (
  <div
    data-entity="player"
    className="bg-cyan-400 shadow-[0_0_8px_rgba(0,255,255,0.7)]"
    style={{
      ...box(player.x, PLAYER_Y, PLAYER_WIDTH, PLAYER_HEIGHT),
      clipPath: 'polygon(50% 0%, 10% 100%, 90% 100%)',
    }}
  />
);

export const enemyColors: Record<EnemyType, string> = {
  [EnemyType.Standard]: 'bg-green-500 shadow-[0_0_8px_rgba(34,197,94,0.7)]',
  [EnemyType.Fast]: 'bg-yellow-400 shadow-[0_0_8px_rgba(250,204,21,0.7)]',
  [EnemyType.Tank]: 'bg-purple-500 shadow-[0_0_8px_rgba(168,85,247,0.7)]',
  [EnemyType.Swooper]: 'bg-pink-500 shadow-[0_0_8px_rgba(236,72,153,0.7)]',
};

interface EnemyProps {
  enemy: RenderSnapshot['enemies'][number];
}

export const EnemyComponent: React.FC<EnemyProps> = ({ enemy }) => (
  <div
    data-entity="enemy"
    data-enemy-type={enemy.type}
    className={enemyColors[enemy.type]}
    style={box(enemy.x, enemy.y, ENEMY_SIZE.width, ENEMY_SIZE.height)}
  />
);

interface BulletProps {
  bullet: Readonly<Bullet>;
}

export const BulletComponent: React.FC<BulletProps> = ({ bullet }) => (
  <div
    data-entity="bullet"
    className="bg-green-400 shadow-[0_0_10px_2px_rgba(52,211,153,0.8)]"
    style={box(bullet.x, bullet.y, BULLET_SIZE.width, BULLET_SIZE.height)}
  />
);

export const GameHud: React.FC<{ score: number; wave: number }> = ({ score, wave }) => (
  <div className="relative p-4 flex justify-between text-2xl text-cyan-400 font-['VT323'] pointer-events-none">
    <p>{`SCORE: ${score}`}</p>
    <p>{`WAVE: ${wave}`}</p>
  </div>
);

interface PlayfieldProps {
  snapshot: RenderSnapshot;
}

/**
 * Draws one post-tick snapshot. Never hand it the live simulation state.
 */
export const Playfield: React.FC<PlayfieldProps> = ({ snapshot }) => (
  <div className="relative bg-black overflow-hidden" style={{ width: `${SCREEN_WIDTH}px`, height: `${SCREEN_HEIGHT}px` }}>
    <GameHud score={snapshot.score} wave={snapshot.wave} />
    <PlayerComponent player={snapshot.player} />
    {snapshot.enemies.map((enemy, index) => (
      <EnemyComponent key={`enemy-${index}`} enemy={enemy} />
    ))}
    {snapshot.bullets.map((bullet, index) => (
      <BulletComponent key={`bullet-${index}`} bullet={bullet} />
    ))}
    {snapshot.gameState === GameState.GameOver && (
      <div className="absolute inset-0 bg-black bg-opacity-70 flex flex-col items-center justify-center text-center p-8">
        <h2 className="text-6xl text-red-500 font-title mb-4">GAME OVER</h2>
        <p className="text-lg text-gray-400">[R] or [ENTER] to play again.</p>
      </div>
    )}
  </div>
);
