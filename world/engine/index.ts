export { Game } from './game';
export type { GameSnapshot, GameOptions } from './game';
