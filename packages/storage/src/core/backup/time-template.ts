function pad(value: number, width = 2): string {
  return String(value).padStart(width, "0")
}

function dayOfYear(at: Date): number {
  const startOfYear = Date.UTC(at.getUTCFullYear(), 0, 1)
  return Math.floor((at.getTime() - startOfYear) / 86_400_000) + 1
}

/**
 * strftime-style rendering in UTC. Supports %Y %y %m %d %H %M %S %j and %%;
 * any other directive is left as written.
 */
export function renderTimeTemplate(template: string, at: Date): string {
  return template.replace(/%(.)/gs, (directive: string, code: string) => {
    switch (code) {
      case "Y":
        return pad(at.getUTCFullYear(), 4)
      case "y":
        return pad(at.getUTCFullYear() % 100)
      case "m":
        return pad(at.getUTCMonth() + 1)
      case "d":
        return pad(at.getUTCDate())
      case "H":
        return pad(at.getUTCHours())
      case "M":
        return pad(at.getUTCMinutes())
      case "S":
        return pad(at.getUTCSeconds())
      case "j":
        return pad(dayOfYear(at), 3)
      case "%":
        return "%"
      default:
        return directive
    }
  })
}
