declare module 'bmp-js' {
  namespace bmp {
    interface BmpImage {
      width: number;
      height: number;
      /** Pixels in ABGR order, four bytes each */
      data: Buffer;
      is_with_alpha: boolean;
    }

    function decode(buffer: Buffer): BmpImage;
  }

  export = bmp;
}
