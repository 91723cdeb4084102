const duplicatedSlashesRegexp = new RegExp("(^\\/|[^:\\/]+\\/)\\/+", "g")

// Given some path segments returns a properly formatted path similarly to Nodejs path.join()
// Remove duplicated slashes
// Does not remove leading/trailing slashes and adds a slash between segments
export const pathJoin = (...pathParts: Array<string | string[] | undefined>) =>
  pathParts
    .flat() // Flatten
    .filter((segment): segment is string => !!segment) // Remove empty parts
    .join("/")
    .replace(duplicatedSlashesRegexp, "$1")

export const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value)
