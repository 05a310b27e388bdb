/**
 * Example: counter and product list
 *
 * Run with: npm run example
 * Render:   npm run tessera -- render examples/site.ts --path /products
 */
import {
  $,
  Signal,
  UI,
  color,
  defineApp,
  defineComponent,
  definePage,
  on,
  style,
  type Component,
} from "tessera"

// ============================================================================
// Components
// ============================================================================

const Card = defineComponent("Card", (props: { title: string; body: string }) =>
  UI.styled(
    UI.article(UI.h2(props.title), UI.p(props.body)),
    style.padding(16),
    style.background(color.surface),
    style.border(1, color.border, { radius: 8 }),
  ),
)

const Nav: Component = {
  name: "Nav",
  body: () =>
    UI.styled(
      UI.nav(UI.link("/", "Counter"), " ", UI.link("/products", "Products")),
      style.flex("row", { gap: 12 }),
      style.accessibility({ label: "Main" }),
    ),
}

// ============================================================================
// Pages
// ============================================================================

// Actions copy the computed label into the output after each write
const showLabel = $.expr('document.getElementById("clicks").textContent = label.value')

const counter = definePage({
  path: "/",
  metadata: { title: "Counter" },
  signals: {
    count: Signal.state(0),
    label: Signal.computed($.template($.str("Clicked "), $.signal("count"), $.str(" times"))),
    increment: Signal.action($.increment("count"), showLabel),
    reset: Signal.action($.set("count", $.num(0)), showLabel),
  },
  body: () =>
    UI.main(
      Nav,
      UI.styled(UI.h1("Counter"), style.font({ size: 32, weight: "bold" })),
      UI.el("output", { attrs: { id: "clicks" } }, "Clicked 0 times"),
      UI.styled(UI.button("+1"), style.padding(8, "horizontal"), on("click", "increment")),
      UI.styled(UI.button("Reset"), style.padding(8, "horizontal"), on("click", "reset")),
    ),
})

const products = [
  { name: "Notebook", blurb: "Dotted pages, lay-flat binding." },
  { name: "Pencil", blurb: "Soft graphite, no eraser." },
  { name: "Ruler", blurb: "Thirty centimetres of aluminium." },
]

const productList = definePage({
  path: "/products",
  metadata: { title: "Products", description: "Things we sell" },
  body: () =>
    UI.main(
      Nav,
      UI.h1("Products"),
      UI.styled(
        UI.each(products, (product) => Card({ title: product.name, body: product.blurb })),
        style.grid(3, { gap: 16 }),
      ),
      UI.show(products.length === 0, UI.p("Nothing in stock")),
    ),
})

export default defineApp({
  metadata: { site: "Stationery" },
  pages: [counter, productList],
})
