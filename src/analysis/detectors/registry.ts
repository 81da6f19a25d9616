/**
 * Ordered detector registry.
 *
 * Selection policy: first registered, first tried. The default
 * registration keeps extension sets disjoint, so order only matters for
 * detectors a caller adds on top.
 */

import { ConfigError } from "../../errors";
import { Detector } from "./types";

export class DetectorRegistry {
  private readonly detectors: Detector[] = [];
  private frozen = false;

  constructor(detectors: readonly Detector[] = []) {
    for (const detector of detectors) {
      this.register(detector);
    }
  }

  register(detector: Detector): void {
    if (this.frozen) {
      throw new ConfigError("Cannot register detectors after the registry is frozen", {
        detector: detector.name,
      });
    }
    this.detectors.push(detector);
  }

  /**
   * First detector whose canAnalyze accepts the path.
   */
  getDetector(filePath: string): Detector | undefined {
    return this.detectors.find((detector) => detector.canAnalyze(filePath));
  }

  /**
   * Distinct languages in registration order.
   */
  getSupportedLanguages(): string[] {
    return [...new Set(this.detectors.map((detector) => detector.language))];
  }

  getDetectors(): Detector[] {
    return [...this.detectors];
  }

  freeze(): void {
    this.frozen = true;
  }

  get isFrozen(): boolean {
    return this.frozen;
  }
}
