import { describe, it, expect } from "vitest"
import { Option } from "effect"
import { assemble } from "./assembler"

const HEAD_START = [
  "<!DOCTYPE html>",
  '<html lang="en">',
  "<head>",
  '<meta charset="utf-8">',
  '<meta name="viewport" content="width=device-width, initial-scale=1">',
]

describe("assemble", () => {
  it("builds a minimal document", () => {
    expect(assemble({ title: Option.some("A & B"), body: "<p>x</p>" })).toBe(
      [...HEAD_START, "<title>A &amp; B</title>", "</head>", "<body>", "<p>x</p>", "</body>", "</html>", ""].join("\n"),
    )
  })

  it("places every part in document order", () => {
    const html = assemble({
      title: Option.none(),
      description: 'say "hi"',
      keywords: ["a", "b"],
      structuredData: ['{"a":1}'],
      themeName: "dusk",
      themeCSS: ":root {}\n",
      componentCSS: "",
      body: "<p>x</p>",
      scripts: ['<script src="/r.js"></script>'],
    })
    expect(html).toBe(
      [
        "<!DOCTYPE html>",
        '<html lang="en" data-theme="dusk">',
        "<head>",
        '<meta charset="utf-8">',
        '<meta name="viewport" content="width=device-width, initial-scale=1">',
        '<meta name="description" content="say &quot;hi&quot;">',
        '<meta name="keywords" content="a, b">',
        "<style>",
        ":root {}",
        "</style>",
        '<script type="application/ld+json">{"a":1}</script>',
        "</head>",
        "<body>",
        "<p>x</p>",
        '<script src="/r.js"></script>',
        "</body>",
        "</html>",
        "",
      ].join("\n"),
    )
  })

  it("skips an empty description", () => {
    expect(assemble({ title: Option.none(), description: "", body: "" })).not.toContain('name="description"')
  })
})
