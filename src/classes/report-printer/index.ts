/**
 * Report Printer Module - Exports
 */

export { ReportPrinter } from './ReportPrinter';
export { Writer } from './Writer';
