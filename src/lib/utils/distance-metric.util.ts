import { DistanceMetricEnum } from '../../enums/distance-metric.enum.js';
import { ConfigurationError } from '../errors.js';

const METRIC_ALIASES: Record<string, DistanceMetricEnum> = {
  cosine: DistanceMetricEnum.COSINE,
  cosinesimil: DistanceMetricEnum.COSINE,
  euclidean: DistanceMetricEnum.EUCLIDEAN,
  euclid: DistanceMetricEnum.EUCLIDEAN,
  l2: DistanceMetricEnum.EUCLIDEAN,
  dot_product: DistanceMetricEnum.DOT_PRODUCT,
  dotproduct: DistanceMetricEnum.DOT_PRODUCT,
  dot: DistanceMetricEnum.DOT_PRODUCT,
  inner_product: DistanceMetricEnum.DOT_PRODUCT,
  innerproduct: DistanceMetricEnum.DOT_PRODUCT,
  manhattan: DistanceMetricEnum.MANHATTAN,
  l1: DistanceMetricEnum.MANHATTAN,
};

/**
 * Resolve a metric name or backend alias ('l2', 'inner_product', 'l1', ...)
 * @throws ConfigurationError for an unknown metric
 */
export function normalizeDistanceMetric(metric: string): DistanceMetricEnum {
  const normalized = METRIC_ALIASES[metric.trim().toLowerCase()];
  if (!normalized) {
    throw new ConfigurationError(
      `Unsupported distance metric: ${metric}. Supported metrics: ${Object.values(DistanceMetricEnum).join(', ')}`
    );
  }
  return normalized;
}
