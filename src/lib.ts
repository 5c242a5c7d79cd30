export { pairingSums, pairingSumList, pairingKey, quartetPairings, assertQuartet } from './quartet';
export { satisfiesFourPointCondition, sumsAgree, largestSumsAgree, assertTolerance } from './fourPoint';
export {
  isAdditive,
  quartets,
  quartetCount,
  findViolations,
  checkAdditivity,
  type CheckAdditivityOptions,
} from './additivity';
export { treeDistances, perturbEntry } from './distance';
export { randomTree, randomTreeMatrix, type LabeledMatrix } from './synthetic';
export { parseMatrixInput, parseCsvMatrix } from './io/parse';
export { emitReport, emitMarkdown, type ReportDocument } from './io/emit';
export { emitHtml } from './io/emitHtml';
export { InvalidQuartetError, NegativeToleranceError, MatrixInputError } from './errors';
export * from './types';
