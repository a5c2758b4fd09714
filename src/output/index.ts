/**
 * Output module exports
 */

export {
  formatReport,
  formatJSON,
  formatInline,
  formatConstraints,
  formatClasses,
} from './formatter.js';
