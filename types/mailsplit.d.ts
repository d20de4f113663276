// mailsplit ships no type declarations; this covers the Splitter surface used
// by the gateway's extractor.

declare module 'mailsplit' {
  import { Transform, TransformOptions } from 'stream';

  /** Header block of one MIME node, emitted before its body. */
  export interface MimeNode {
    type: 'node';
    /** Lower-cased media type, `false` when the header is absent. */
    contentType: string | false;
    multipart: string | false;
    /** Lower-cased disposition value, `false` when the header is absent. */
    disposition: string | false;
    getHeaders(): Buffer;
  }

  /** Body bytes of a leaf node, still transfer-encoded. */
  export interface BodyChunk {
    type: 'body';
    node: MimeNode;
    value: Buffer;
  }

  /** Multipart structure between parts: boundaries, preamble, epilogue. */
  export interface StructureChunk {
    type: 'data';
    value: Buffer;
  }

  export type SplitterChunk = MimeNode | BodyChunk | StructureChunk;

  export interface SplitterOptions extends TransformOptions {
    ignoreEmbedded?: boolean;
    maxHeadSize?: number;
  }

  export class Splitter extends Transform {
    constructor(options?: SplitterOptions);
    [Symbol.asyncIterator](): AsyncIterableIterator<SplitterChunk>;
  }
}
