export { transformLoss, createLossTransform, isPercentMode, type LossTransformFn } from './loss-transform.js';
