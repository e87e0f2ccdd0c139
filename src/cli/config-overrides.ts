/**
 * Error thrown when configuration override fails
 */
export class ConfigOverrideError extends Error {
  constructor(message: string, public readonly override: string) {
    super(message)
    this.name = 'ConfigOverrideError'
  }
}

/**
 * Represents a parsed override with its path and value
 */
interface ParsedOverride {
  /** Dot-notation path to the property */
  path: string[]
  /** Raw string value from command line */
  value: string
  /** Original override string for error reporting */
  original: string
}

type Container = Record<string, unknown> | unknown[]

const VALID_ROOT_PROPERTIES = ['input', 'tickers', 'range', 'charts', 'output']

function isContainer(value: unknown): value is Container {
  return typeof value === 'object' && value !== null
}

/**
 * Parses a single override string into path components and value
 * Supports dot notation like "input.path=/new/path" or "charts.0.granularity=week"
 */
function parseOverride(override: string): ParsedOverride {
  const equalIndex = override.indexOf('=')
  if (equalIndex === -1) {
    throw new ConfigOverrideError(
      `Invalid override syntax: "${override}". Expected format: "path.to.property=value"`,
      override
    )
  }

  const pathString = override.substring(0, equalIndex).trim()
  const value = override.substring(equalIndex + 1)

  const path = pathString.split('.').map(segment => segment.trim()).filter(segment => segment.length > 0)

  if (path.length === 0) {
    throw new ConfigOverrideError(
      `Invalid override syntax: "${override}". Property path cannot be empty`,
      override
    )
  }

  const root = path[0]
  if (root === undefined || !VALID_ROOT_PROPERTIES.includes(root)) {
    throw new ConfigOverrideError(
      `Invalid root property "${String(root)}" in override "${override}". Valid root properties: ${VALID_ROOT_PROPERTIES.join(', ')}`,
      override
    )
  }

  return {
    path,
    value,
    original: override
  }
}

/**
 * Converts a string value to the appropriate type based on context
 * Handles common data types: boolean, number, string, arrays
 */
function convertValue(value: string, path: string[], original: string): unknown {
  // Handle null
  if (value.toLowerCase() === 'null') return null

  // Handle boolean values
  if (value.toLowerCase() === 'true') return true
  if (value.toLowerCase() === 'false') return false

  // Handle array and object values (JSON syntax)
  if ((value.startsWith('[') && value.endsWith(']')) || (value.startsWith('{') && value.endsWith('}'))) {
    try {
      return JSON.parse(value)
    } catch (error) {
      throw new ConfigOverrideError(
        `Invalid JSON value in override "${original}": ${error instanceof Error ? error.message : 'Invalid JSON'}`,
        original
      )
    }
  }

  // tickers=AAPL,MSFT
  if (path.length === 1 && path[0] === 'tickers') {
    return value.split(',').map(ticker => ticker.trim()).filter(ticker => ticker.length > 0)
  }

  // Handle numeric values
  if (/^-?\d+$/.test(value)) {
    return parseInt(value, 10)
  }
  if (/^-?\d*\.\d+$/.test(value) || /^-?\d*\.?\d+[eE][+-]?\d+$/.test(value)) {
    return parseFloat(value)
  }

  // Return as string for everything else
  return value
}

function readChild(container: Container, segment: string, original: string): unknown {
  if (Array.isArray(container)) {
    if (!/^\d+$/.test(segment)) {
      throw new ConfigOverrideError(`Expected a numeric index, got "${segment}" in "${original}"`, original)
    }
    return container[Number(segment)]
  }
  return container[segment]
}

function writeChild(container: Container, segment: string, value: unknown, original: string): void {
  if (Array.isArray(container)) {
    if (!/^\d+$/.test(segment)) {
      throw new ConfigOverrideError(`Expected a numeric index, got "${segment}" in "${original}"`, original)
    }
    container[Number(segment)] = value
    return
  }
  container[segment] = value
}

/**
 * Sets a nested property value using dot notation path
 * Creates intermediate objects as needed
 */
function setNestedProperty(root: Container, path: string[], value: unknown, original: string): void {
  let current: Container = root

  // Navigate to the parent of the target property
  for (let i = 0; i < path.length - 1; i++) {
    const segment = path[i] ?? ''
    const next = readChild(current, segment, original)

    if (next === undefined || next === null) {
      // Create intermediate object
      const created: Record<string, unknown> = {}
      writeChild(current, segment, created, original)
      current = created
    } else if (isContainer(next)) {
      current = next
    } else {
      throw new ConfigOverrideError(
        `Cannot override property "${path.slice(0, i + 1).join('.')}" in "${original}": intermediate value is not an object`,
        original
      )
    }
  }

  writeChild(current, path[path.length - 1] ?? '', value, original)
}

/**
 * Applies command-line overrides to a raw configuration
 */
export class ConfigOverrides {
  /**
   * Apply overrides in order to a copy of the configuration
   * @param config Raw configuration object, left unchanged
   * @param overrides Strings of the form "path.to.property=value"
   * @returns The overridden copy
   * @throws ConfigOverrideError if an override is malformed
   */
  public static apply(config: unknown, overrides: readonly string[]): unknown {
    if (overrides.length === 0) {
      return config
    }
    if (!isContainer(config) || Array.isArray(config)) {
      throw new ConfigOverrideError('Configuration must be an object to apply overrides', overrides.join(' '))
    }

    const result: Record<string, unknown> = structuredClone(config)
    for (const override of overrides) {
      const parsed = parseOverride(override)
      setNestedProperty(result, parsed.path, convertValue(parsed.value, parsed.path, parsed.original), parsed.original)
    }
    return result
  }
}
