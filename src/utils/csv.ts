/**
 * Parse a CSV line handling quoted values and escaped quotes
 */
export function parseCsvLine(line: string, delimiter = ','): string[] {
  const values: string[] = []
  let current = ''
  let inQuotes = false
  let i = 0

  while (i < line.length) {
    const char = line[i]
    const nextChar = line[i + 1]

    if (char === '"') {
      if (inQuotes && nextChar === '"') {
        // Escaped quote
        current += '"'
        i += 2
        continue
      }
      inQuotes = !inQuotes
      i++
      continue
    }

    if (char === delimiter && !inQuotes) {
      values.push(current.trim())
      current = ''
      i++
      continue
    }

    current += char
    i++
  }

  // Add last value
  values.push(current.trim())

  return values
}

/**
 * Quote a CSV field when it contains the delimiter, a quote or a newline
 */
export function formatCsvField(value: string, delimiter = ','): string {
  if (value.includes(delimiter) || value.includes('"') || value.includes('\n')) {
    return `"${value.replace(/"/g, '""')}"`
  }
  return value
}
