declare module 'seek-bzip' {
  interface Bunzip {
    /**
     * Decompress a complete bzip2 stream. Returns a new Buffer when no output is given.
     */
    decode(input: Uint8Array, output?: Uint8Array, multistream?: boolean): Buffer;
  }

  const bunzip: Bunzip;
  export = bunzip;
}
