/**
 * @module diagnostics
 *
 * 诊断系统模块。
 *
 * 包含：
 * - 结构化诊断 (Diagnostic, DiagnosticBuilder, DiagnosticError)
 * - 生成器错误类型 (LoadError, ScanError)
 * - 诊断代码 (DiagnosticCode)
 */

export {
  DiagnosticSeverity,
  DiagnosticCode,
  DiagnosticError,
  DiagnosticBuilder,
  LoadError,
  ScanError,
  formatDiagnostic,
  formatLocation,
  type Diagnostic,
} from './diagnostics.js';
