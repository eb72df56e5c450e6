export {
  encodeConcessionCode,
  encodeLocationParts,
  decodeConcessionCode,
  isLocationCode,
  humanizeLocation,
  humanizeConcessionCode,
  codePrefix,
  concessionCodeFromBoardRecord,
} from './concession-code.js';
export { buildTsrIndex, compareTsrRows } from './tsr-index.js';
