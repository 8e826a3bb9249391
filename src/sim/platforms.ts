import type { Platform, PlatformId } from "./types";

/**
 * Troponin testing platforms.
 * - CentralLab: cheap high-sensitivity assay, slow turnaround, results often not
 *   back when the clinician is ready
 * - PointOfCare: expensive cartridge, fast, usually available at the bedside
 */
export const PLATFORMS: Record<PlatformId, Platform> = {
  CentralLab: {
    id: "CentralLab",
    label: "Central Lab (High Sensitivity)",
    unitCost: 5,
    turnaroundMinutes: 90,
    availability: 0.35,
  },
  PointOfCare: {
    id: "PointOfCare",
    label: "Point of Care (POC)",
    unitCost: 30,
    turnaroundMinutes: 20,
    availability: 0.85,
  },
};

export function getPlatform(id: PlatformId): Platform {
  return PLATFORMS[id];
}
