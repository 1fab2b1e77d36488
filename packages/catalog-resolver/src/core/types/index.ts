export {
  MatchLogic,
  RESERVED_VARIABLE_NAMES,
  type YearList,
  type YearSet,
  type Product,
  type AppliesTo,
  type GeographyLevel,
  type Variable,
} from './catalog.js';

export {
  errorDiagnostic,
  warningDiagnostic,
  hasErrors,
  succeed,
  fail,
  type Outcome,
  type Diagnostic,
  type DiagnosticCode,
  type DiagnosticSeverity,
  type Listing,
  type SelectionResult,
} from './diagnostics.js';
