export {
  MonitorError,
  ReadTimeoutError,
  ReadFaultError,
  CalibrationError,
  StoreWriteError,
  AnalysisError,
  ConfigurationError,
  formatErrorMessage,
  toError,
} from './monitor.errors';
