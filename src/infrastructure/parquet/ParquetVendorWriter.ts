import { mkdir, rename, rm, stat } from "fs/promises";
import path from "path";
import { ParquetSchema, ParquetWriter } from "@dsnp/parquetjs";
import type { ColumnarWriter, FileHandle, WriteTarget } from "../../ports/ColumnarWriter";
import type { VendorRow } from "../../core/vendor/vendor.types";
import { WriteError, toErrorMessage } from "../../core/errors/pipeline.errors";

export const vendorParquetSchema = new ParquetSchema({
  vendor_id: { type: "UTF8" },
  name: { type: "UTF8" },
  city_id: { type: "UTF8" },
  rating: { type: "DOUBLE", optional: true },
  delivery_fee: { type: "DOUBLE", optional: true },
  categories: { type: "UTF8", repeated: true },
  latitude: { type: "DOUBLE", optional: true },
  longitude: { type: "DOUBLE", optional: true },
  fetched_at: { type: "TIMESTAMP_MILLIS" }
});

export const PARQUET_EXTENSION = "parquet";
export const PARQUET_CONTENT_TYPE = "application/vnd.apache.parquet";

type ParquetRow = Record<string, string | number | string[] | Date>;

/** Null columns are left out of the row; parquet stores them as absent values. */
export const toParquetRow = (row: VendorRow): ParquetRow => {
  const out: ParquetRow = {
    vendor_id: row.vendorId,
    name: row.name,
    city_id: row.cityId,
    fetched_at: row.fetchedAt
  };
  if (row.rating != null) out.rating = row.rating;
  if (row.deliveryFee != null) out.delivery_fee = row.deliveryFee;
  if (row.categories != null && row.categories.length > 0) out.categories = row.categories;
  if (row.latitude != null) out.latitude = row.latitude;
  if (row.longitude != null) out.longitude = row.longitude;
  return out;
};

const errnoCode = (err: unknown): string | undefined => {
  if (typeof err !== "object" || err === null || !("code" in err)) return undefined;
  const { code } = err;
  return typeof code === "string" && /^E[A-Z]+$/.test(code) ? code : undefined;
};

export const filePathFor = (scratchDir: string, target: WriteTarget): string =>
  path.join(scratchDir, `city_id=${target.cityId}`, `vendors_${target.runTimestamp}.${PARQUET_EXTENSION}`);

/**
 * Writes one city's rows as a single Parquet file with an embedded schema.
 * The file appears under its final name only once fully written.
 */
export class ParquetVendorWriter implements ColumnarWriter {
  constructor(private readonly scratchDir: string) {}

  async write(rows: VendorRow[], target: WriteTarget): Promise<FileHandle> {
    const finalPath = filePathFor(this.scratchDir, target);
    const partialPath = `${finalPath}.partial`;
    const context = { cityId: target.cityId, path: finalPath };

    try {
      await mkdir(path.dirname(finalPath), { recursive: true });
      const writer = await ParquetWriter.openFile(vendorParquetSchema, partialPath);
      try {
        for (const row of rows) {
          await writer.appendRow(toParquetRow(row));
        }
      } finally {
        await writer.close();
      }
      await rename(partialPath, finalPath);
      const { size } = await stat(finalPath);

      return {
        path: finalPath,
        rowCount: rows.length,
        sizeBytes: size,
        contentType: PARQUET_CONTENT_TYPE,
        extension: PARQUET_EXTENSION
      };
    } catch (err) {
      await rm(partialPath, { force: true }).catch(() => undefined);
      throw new WriteError({
        kind: errnoCode(err) ? "io" : "encoding",
        message: `Parquet write failed for city ${target.cityId}: ${toErrorMessage(err)}`,
        context,
        cause: err
      });
    }
  }
}
