import { Capability, DetectionRequest, ModelVersion } from '../types';

export interface CapabilityHandler {
  /**
   * Engine-specific `parameters` sent with the predict call
   */
  buildParameters(model: ModelVersion, request: DetectionRequest): Record<string, unknown>;
}

function flag(metadata: Record<string, unknown>, key: string, fallback: boolean): boolean {
  const value = metadata[key];
  return typeof value === 'boolean' ? value : fallback;
}

const VOLUME_UNITS = ['cubic_meters', 'cubic_yards', 'cubic_feet'] as const;
type VolumeUnit = typeof VOLUME_UNITS[number];

function isVolumeUnit(value: unknown): value is VolumeUnit {
  return typeof value === 'string' && VOLUME_UNITS.some(unit => unit === value);
}

export const capabilityHandlers: Record<Capability, CapabilityHandler> = {
  [Capability.DAMAGE]: {
    buildParameters: (model, { metadata }) => ({
      confidence_threshold: model.confidenceThreshold,
      enable_segmentation: flag(metadata, 'enableSegmentation', true),
      enable_severity: flag(metadata, 'enableSeverity', true)
    })
  },

  [Capability.MATERIAL]: {
    buildParameters: (model, { metadata }) => ({
      confidence_threshold: model.confidenceThreshold,
      enable_counting: flag(metadata, 'enableCounting', true),
      enable_brand_detection: flag(metadata, 'enableBrandDetection', true)
    })
  },

  [Capability.VOLUME]: {
    buildParameters: (model, { metadata }) => ({
      confidence_threshold: model.confidenceThreshold,
      unit: isVolumeUnit(metadata.volumeUnit) ? metadata.volumeUnit : 'cubic_yards'
    })
  }
};
