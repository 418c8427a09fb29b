declare module 'circomlibjs' {
  interface PoseidonField {
    toObject(hash: Uint8Array): bigint;
  }

  interface Poseidon {
    (inputs: (number | bigint)[]): Uint8Array;
    F: PoseidonField;
  }

  export function buildPoseidon(): Promise<Poseidon>;
}
