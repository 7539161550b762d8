import type { VendorRow } from "../core/vendor/vendor.types";

export type WriteTarget = {
  cityId: string;
  runTimestamp: string;
};

export type FileHandle = {
  path: string;
  rowCount: number;
  sizeBytes: number;
  contentType: string;
  extension: string;
};

export interface ColumnarWriter {
  write(rows: VendorRow[], target: WriteTarget): Promise<FileHandle>;
}
