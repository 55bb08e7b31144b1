// packages/solver-core/src/index.ts
//
// Entry point for the solver-core package.
// Re-exports the solver so consumers can import from one place.
//
// Includes:
//   • letterState.ts   → partial-word record (LetterState)
//   • parser.ts        → reply → facts, verdicts, hints
//   • planner.ts       → next question from the letter state
//   • reconstructor.ts → tiered word reconstruction
//   • level.ts         → one level, question to accepted guess
//   • session.ts       → levels in sequence
//   • keeper.ts        → the practice keeper the server hosts
//   • words.ts         → bundled word list
//
// Example usage:
//   import { LetterState, planNextQuestion, runSession } from '@riddle/solver-core';

export * from './types.js';
export * from './pattern.js';
export * from './letterState.js';
export * from './questions.js';
export * from './parser.js';
export * from './planner.js';
export * from './oracles.js';
export * from './reconstructor.js';
export * from './level.js';
export * from './session.js';
export * from './keeper.js';
export * from './words.js';
