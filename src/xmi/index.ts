export { loadXmi } from './loader.js';
export {
    DEFAULT_MULTIPLICITY,
    UNCONSTRAINED,
    formatMultiplicity,
    isSingleValued,
    multiplicityFromBounds,
    parseMultiplicity,
} from './multiplicity.js';
export { canonicalPrimitive, primitiveFromHref } from './primitives.js';
