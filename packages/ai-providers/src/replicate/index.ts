export {
  ReplicateProvider,
  SVD_VERSION,
  svdVideoLength,
  type ReplicatePrediction,
  type ReplicateProviderOptions,
} from "./ReplicateProvider.js";
