export { StabilityProvider, aspectRatioFor, type StabilityAspectRatio } from "./StabilityProvider.js";
