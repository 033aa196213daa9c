import type { ResolvedTemporalOptions, TemporalOptions } from "@/types"
import { deprecationWarning } from "@/utils"

/**
 * Resolve formatting options, accepting the deprecated `datetimeFmt` / `dateFmt` names
 */
export function resolveOptions(options: TemporalOptions = {}): ResolvedTemporalOptions {
  if (options.datetimeFmt !== undefined) {
    deprecationWarning("'datetimeFmt' has been renamed to 'datetimeFormat'")
  }
  if (options.dateFmt !== undefined) {
    deprecationWarning("'dateFmt' has been renamed to 'dateFormat'")
  }

  return {
    datetimeFormat: options.datetimeFormat ?? options.datetimeFmt,
    dateFormat: options.dateFormat ?? options.dateFmt,
  }
}
