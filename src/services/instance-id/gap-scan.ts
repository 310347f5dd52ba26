import { MAX_INSTANCE_ID, isValidInstanceId, type ApplicationInstanceId } from '../../types/instance-id.js'
import { IdSpaceExhaustedError, NamespaceCorruptionError } from './errors.js'

// Canonical decimal form: no sign, no leading zeros, no whitespace
const RECORD_NAME_PATTERN = /^[1-9][0-9]{0,4}$/

/**
 * Parse a record name into the instance ID it claims.
 * Throws NamespaceCorruptionError for anything this protocol would not have written.
 */
export function parseRecordName(name: string): ApplicationInstanceId {
  if (!RECORD_NAME_PATTERN.test(name)) {
    throw new NamespaceCorruptionError(name)
  }
  const id = Number(name)
  if (!isValidInstanceId(id)) {
    throw new NamespaceCorruptionError(name)
  }
  return id
}

export function formatRecordName(id: ApplicationInstanceId): string {
  return id.toString(10)
}

/**
 * Find the smallest positive ID not claimed by any of the given record names.
 *
 * Store listings are not trusted to be in numeric order ("10" lists before "2"
 * lexicographically), so every name is parsed and the IDs are sorted before scanning.
 * All names are validated up front: a foreign record fails the scan before any claim is attempted.
 */
export function findSmallestFreeId(recordNames: Iterable<string>): ApplicationInstanceId {
  const claimed: ApplicationInstanceId[] = []
  for (const name of recordNames) {
    claimed.push(parseRecordName(name))
  }
  claimed.sort((a, b) => a - b)

  let lastSeen = 0
  for (const id of claimed) {
    if (id > lastSeen + 1) {
      // Gap found: lastSeen + 1 is free
      return lastSeen + 1
    }
    lastSeen = id
  }

  if (lastSeen === MAX_INSTANCE_ID) {
    throw new IdSpaceExhaustedError()
  }

  return lastSeen + 1
}
