export { buildCityDimensions } from './city-dimensions.js';
