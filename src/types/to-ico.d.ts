declare module 'to-ico' {
  interface ToIcoOptions {
    /** Resize the largest input to every size in `sizes` */
    resize?: boolean;
    sizes?: number[];
  }

  function toIco(input: Buffer | Buffer[], options?: ToIcoOptions): Promise<Buffer>;

  export = toIco;
}
