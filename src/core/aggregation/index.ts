export {
  SchemaMismatchError,
  aggregateEncryption,
  aggregateStatistics,
  aggregateStructural,
  reconcile
} from './aggregators'
