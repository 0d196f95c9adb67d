export type ImageFormat = 'png' | 'svg';

/** A rendered page before the commit-wide numbering barrier */
export interface PageImage {
  filePath: string;
  /** 1-based within the file */
  pageIndex: number;
  image: Buffer;
  format: ImageFormat;
  width: number;
  height: number;
  rowCount: number;
}

export interface RenderedPage extends PageImage {
  /** 1-based, gap-free across all files of one commit */
  sequenceNumber: number;
}
