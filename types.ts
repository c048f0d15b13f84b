export enum EnemyType {
  Standard = 'standard',
  Fast = 'fast',
  Tank = 'tank',
  Swooper = 'swooper',
}

export enum GameState {
  Playing = 'playing',
  GameOver = 'gameOver',
}

export type Position = {
  x: number;
  y: number;
};

export type EnemyStats = {
  maxHealth: number;
  speedMultiplier: number;
  points: number;
};

export type Player = {
  x: number;
};

export type Enemy = Position & {
  direction: number; // 1 = right, -1 = left
  type: EnemyType;
  health: number;
};

export type Bullet = Position;

// Movement state shared by every enemy on the field
export type Formation = {
  direction: number;
  speed: number;
};

export type SimulationState = {
  player: Player;
  enemies: Enemy[];
  bullets: Bullet[];
  formation: Formation;
  wave: number;
  score: number;
  gameState: GameState;
};

export type InputSnapshot = {
  left: boolean;
  right: boolean;
  fire: boolean; // edge-triggered, true once per press
  reset: boolean; // edge-triggered
};

export type DestroyedEnemy = Position & {
  points: number;
};

export type EnemyHit = Position & {
  enemyType: EnemyType;
  remainingHealth: number;
  destroyed: boolean;
};

export type GameEvent =
  | { type: 'shotFired'; x: number; y: number }
  | { type: 'enemyDamaged'; x: number; y: number; enemyType: EnemyType; remainingHealth: number }
  | { type: 'enemyDestroyed'; x: number; y: number; enemyType: EnemyType; points: number }
  | { type: 'waveCleared'; wave: number }
  | { type: 'waveStarted'; wave: number; enemyCount: number; speed: number }
  | { type: 'gameOver'; finalScore: number; wave: number }
  | { type: 'reset' };

export type RenderSnapshot = {
  readonly player: Readonly<Player>;
  readonly enemies: ReadonlyArray<Readonly<Position & { type: EnemyType; health: number }>>;
  readonly bullets: ReadonlyArray<Readonly<Bullet>>;
  readonly score: number;
  readonly wave: number;
  readonly gameState: GameState;
};

export type TickResult = {
  events: GameEvent[];
  snapshot: RenderSnapshot;
};

export type Logger = (message: string) => void;
