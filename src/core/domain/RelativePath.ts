import path from "node:path"

/**
 * A root-relative path in the platform's own separator style.
 * It is the join key between the source tree and the replica tree.
 */
export type RelativePath = string

/** Every directory under a root, parents listed before their children. */
export type DirectorySet = ReadonlyArray<RelativePath>

/** Every regular file under a root. */
export type FileSet = ReadonlyArray<RelativePath>

export const toRelativePath = (root: string, absolutePath: string): RelativePath =>
  path.relative(root, absolutePath)

export const resolveUnder = (root: string, relativePath: RelativePath): string =>
  path.join(root, relativePath)

export const depthOf = (relativePath: RelativePath): number =>
  relativePath.split(path.sep).filter((segment) => segment.length > 0).length

/**
 * Stable reorder so that no directory appears before one of its ancestors.
 * Listings from the tree walk are already in this order.
 */
export const sortParentsFirst = (paths: ReadonlyArray<RelativePath>): RelativePath[] =>
  paths
    .map((relativePath, index) => ({ relativePath, index, depth: depthOf(relativePath) }))
    .sort((a, b) => a.depth - b.depth || a.index - b.index)
    .map(({ relativePath }) => relativePath)
