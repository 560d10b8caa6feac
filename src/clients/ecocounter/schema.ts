import { z } from "zod";
import type { Device, RawReading } from "../../types";

const idSchema = z.union([z.number(), z.string().min(1)]);

export const VendorDeviceSchema = z.object({
  idPdc: idSchema,
  nom: z.string(),
  lat: z.number().nullable().optional(),
  lon: z.number().nullable().optional(),
  pratique: z
    .array(z.object({ id: idSchema }))
    .nullable()
    .optional(),
});

export const VendorDeviceListSchema = z.array(VendorDeviceSchema);

export type VendorDevice = z.infer<typeof VendorDeviceSchema>;

// Each reading comes back as a positional [timestamp, count] pair
export const VendorReadingSchema = z.tuple([z.string(), z.number().nullable()]);

export const VendorReadingListSchema = z.array(VendorReadingSchema);

export function toDevice(vendor: VendorDevice): Device {
  return {
    id: vendor.idPdc,
    name: vendor.nom,
    latitude: vendor.lat ?? null,
    longitude: vendor.lon ?? null,
    linkedFlows: (vendor.pratique ?? []).map((p) => ({ flowId: p.id })),
  };
}

export function toRawReadings(
  pairs: z.infer<typeof VendorReadingListSchema>
): RawReading[] {
  return pairs.map(([timestamp, count]) => ({ timestamp, count }));
}

export function describeIssues(error: z.ZodError): string {
  return error.issues
    .slice(0, 3)
    .map((i) => `${i.path.join(".") || "<root>"}: ${i.message}`)
    .join(", ");
}
