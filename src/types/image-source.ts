export type RawPixels = {
    pixels: Buffer | Uint8Array;
    width: number;
    height: number;
    channels: 1 | 2 | 3 | 4;
};

export type ImageSource =
    | string                  // path
    | Buffer                  // encoded bytes (jpeg/png/...)
    | { data: Buffer; filename?: string; mime?: string } // upload with its original name
    | RawPixels;              // already decoded, HWC interleaved
