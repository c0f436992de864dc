/**
 * @file    display/display-enumerator.ts
 * @purpose Turn enumerated display descriptors into classified records and
 *          load them into a registry.
 * @owner   Cursor Zoom Core
 * @depends shared/types/zoom.ts, display/coordinate-classifier.ts, display/display-registry.ts
 *
 * Invoked at startup and on every display-change notification. Each run
 * produces fresh records; existing ones are never patched.
 */

import {
  DiagnosticKind,
  DisplayDescriptor,
  DisplayEnumerator,
  DisplayId,
  DisplayOverride,
  DisplayRecord,
  Size,
  ZoomDiagnostic,
} from '../shared/types/zoom';
import { ClassifierConfig, createDisplayRecord } from './coordinate-classifier';
import { DisplayRegistry } from './display-registry';

export interface BuildRecordsOptions {
  /** Capture-source pixel sizes by display id */
  sourcePixelSizes?: Readonly<Record<DisplayId, Size>>;
  overrides?: Readonly<Record<DisplayId, DisplayOverride>>;
  classifierConfig?: ClassifierConfig;
  /**
   * Logical height of the primary display from the previous run, used to
   * flip bottom-left origins when the primary descriptor is degenerate
   */
  fallbackPrimaryLogicalHeight?: number;
}

export interface BuildRecordsResult {
  records: DisplayRecord[];
  diagnostics: ZoomDiagnostic[];
}

/** Descriptors served from configuration (headless runs, tests) */
export class StaticDisplayEnumerator implements DisplayEnumerator {
  private descriptors: DisplayDescriptor[];

  constructor(descriptors: DisplayDescriptor[]) {
    this.descriptors = [...descriptors];
  }

  enumerate(): DisplayDescriptor[] {
    return [...this.descriptors];
  }
}

/**
 * Classify every descriptor. The primary display is classified first so
 * bottom-left origins can be flipped against its logical height.
 */
export function buildDisplayRecords(
  descriptors: DisplayDescriptor[],
  options: BuildRecordsOptions = {},
  nowMs: number = Date.now(),
): BuildRecordsResult {
  const records: DisplayRecord[] = [];
  const diagnostics: ZoomDiagnostic[] = [];

  const primaryDescriptor = descriptors.find((d) => d.isPrimary) ?? descriptors[0];
  const ordered = primaryDescriptor
    ? [primaryDescriptor, ...descriptors.filter((d) => d !== primaryDescriptor)]
    : [];

  let primaryLogicalHeight: number | undefined;

  for (const descriptor of ordered) {
    const result = createDisplayRecord(descriptor, {
      sourcePixelSize: options.sourcePixelSizes?.[descriptor.id],
      override: options.overrides?.[descriptor.id],
      primaryLogicalHeight,
      classifierConfig: options.classifierConfig,
    });

    if (!result.ok) {
      if (descriptor === primaryDescriptor) {
        // Flip the others against the primary the registry still holds
        primaryLogicalHeight = options.fallbackPrimaryLogicalHeight;
      }
      diagnostics.push({
        kind: DiagnosticKind.DegenerateGeometry,
        message: result.reason,
        displayId: descriptor.id,
        timestampMs: nowMs,
      });
      continue;
    }

    if (descriptor === primaryDescriptor) {
      primaryLogicalHeight = result.record.logicalSize.height;
    }

    if (result.classification.kind === 'derived') {
      diagnostics.push({
        kind: DiagnosticKind.ClassificationAmbiguous,
        message:
          `${descriptor.id}: ratio matched no hint, derived ${result.classification.interpretation} ` +
          `at ${result.record.scale.sx}x${result.record.scale.sy}`,
        displayId: descriptor.id,
        timestampMs: nowMs,
      });
    }

    records.push(result.record);
  }

  return { records, diagnostics };
}

/**
 * Enumerate, classify and swap the registry's contents in one step.
 * Displays that fail classification keep their previous record, if any.
 */
export function refreshRegistry(
  registry: DisplayRegistry,
  enumerator: DisplayEnumerator,
  options: BuildRecordsOptions = {},
): ZoomDiagnostic[] {
  const { records, diagnostics } = buildDisplayRecords(enumerator.enumerate(), {
    fallbackPrimaryLogicalHeight: registry.primary()?.logicalSize.height,
    ...options,
  });

  const kept = records.slice();
  for (const d of diagnostics) {
    if (d.kind !== DiagnosticKind.DegenerateGeometry || d.displayId === undefined) continue;
    const prior = registry.get(d.displayId);
    if (prior) kept.push(prior);
  }

  registry.replaceAll(kept);
  return diagnostics;
}
