/**
 * @gas-sponsor/core
 *
 * Gas sponsorship for members of anonymous groups: a two-phase paymaster
 * (validate, then settle) that pays for operations on behalf of a group once
 * the sender proves membership with a zero-knowledge proof.
 */

export * from './types';
export * from './errors';
export * from './validation';
export * from './binding';
export * from './payload';
export * from './poseidon';
export * from './membership-tree';
export * from './group-verifier';
export * from './group-ledger';
export * from './proof-cache';
export * from './epoch-gas-meter';
export * from './policy';
export * from './authorizers';
export * from './validation-pipeline';
export * from './settlement';
export * from './paymaster';
