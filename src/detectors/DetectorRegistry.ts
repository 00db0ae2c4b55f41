/**
 * Detector Registry
 *
 * Ordered registry of the heuristic detectors.
 *
 * Registration order is the run order, and the run order matters: the
 * consolidator keeps the first finding it sees for each dedup key. Built-ins
 * register as reentrancy, access-control, integer-overflow.
 *
 * Design Patterns:
 * - Registry Pattern: detector registration and lookup
 * - Singleton Pattern: single registry instance
 */

import type { RuleInfo } from "../types/index.js";
import type { DetectorId, IDetector } from "./IDetector.js";
import { ReentrancyDetector } from "./reentrancy.js";
import { AccessControlDetector } from "./accessControl.js";
import { IntegerOverflowDetector } from "./integerOverflow.js";
import { logger } from "../utils/logger.js";

export const BUILT_IN_DETECTOR_ORDER: readonly DetectorId[] = Object.freeze([
  "reentrancy",
  "access-control",
  "integer-overflow",
]);

export class DetectorRegistry {
  private static instance: DetectorRegistry | undefined;
  private detectors: Map<DetectorId, IDetector> = new Map();

  private constructor() {
    this.registerBuiltInDetectors();
  }

  static getInstance(): DetectorRegistry {
    if (!DetectorRegistry.instance) {
      DetectorRegistry.instance = new DetectorRegistry();
    }
    return DetectorRegistry.instance;
  }

  private registerBuiltInDetectors(): void {
    this.register(new ReentrancyDetector());
    this.register(new AccessControlDetector());
    this.register(new IntegerOverflowDetector());

    logger.debug(`[DetectorRegistry] Registered ${this.detectors.size} built-in detectors`);
  }

  // -------------------------------------------------------------------------
  // Registration
  // -------------------------------------------------------------------------

  /**
   * Register a detector. Replacing an existing id keeps its position in the
   * run order.
   */
  register(detector: IDetector): void {
    if (this.detectors.has(detector.id)) {
      logger.warn(`[DetectorRegistry] Overwriting existing detector: ${detector.id}`);
    }
    this.detectors.set(detector.id, detector);
  }

  unregister(id: DetectorId): boolean {
    return this.detectors.delete(id);
  }

  // -------------------------------------------------------------------------
  // Lookup
  // -------------------------------------------------------------------------

  get(id: DetectorId): IDetector | undefined {
    return this.detectors.get(id);
  }

  /**
   * All detectors in run order.
   */
  getAll(): IDetector[] {
    return Array.from(this.detectors.values());
  }

  getIds(): DetectorId[] {
    return Array.from(this.detectors.keys());
  }

  /**
   * Every rule the registered detectors can emit, in run order.
   */
  getRules(): RuleInfo[] {
    return this.getAll().flatMap((detector) => detector.rules);
  }

  /**
   * Reset to the built-in detectors (mainly for testing).
   */
  reset(): void {
    this.detectors.clear();
    this.registerBuiltInDetectors();
  }
}

export function getDetectorRegistry(): DetectorRegistry {
  return DetectorRegistry.getInstance();
}

export function isDetectorId(value: string): value is DetectorId {
  return BUILT_IN_DETECTOR_ORDER.some((id) => id === value);
}
