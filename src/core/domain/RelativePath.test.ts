import { describe, expect, test } from "vitest"
import path from "node:path"
import { depthOf, resolveUnder, sortParentsFirst, toRelativePath } from "./RelativePath"

const p = (...segments: string[]) => segments.join(path.sep)

describe("RelativePath", () => {
  test("toRelativePath is anchored to the given root", () => {
    const root = path.join(path.sep, "data", "source")

    expect(toRelativePath(root, path.join(root, "a"))).toBe("a")
    expect(toRelativePath(root, path.join(root, "a", "b", "c.txt"))).toBe(p("a", "b", "c.txt"))
  })

  test("resolveUnder joins a relative path onto another root", () => {
    const replica = path.join(path.sep, "data", "replica")

    expect(resolveUnder(replica, p("docs", "readme.txt"))).toBe(
      path.join(replica, "docs", "readme.txt")
    )
  })

  test("depthOf counts segments", () => {
    expect(depthOf("a")).toBe(1)
    expect(depthOf(p("a", "b", "c"))).toBe(3)
  })

  test("sortParentsFirst moves ancestors ahead and keeps sibling order", () => {
    const sorted = sortParentsFirst([p("a", "b", "c"), "z", p("a", "b"), "a", p("z", "y")])

    expect(sorted).toEqual(["z", "a", p("a", "b"), p("z", "y"), p("a", "b", "c")])
  })
})
