import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { collapseWhitespace, createFormatOptions, defaultFormatOptions, format, wrapText } from "./formatter.js";

describe("collapseWhitespace", () => {
  it("joins whitespace runs with single spaces", () => {
    assert.equal(collapseWhitespace("  Ahmed \n\t Ali  "), "Ahmed Ali");
  });
});

describe("wrapText", () => {
  it("fills lines greedily without splitting words", () => {
    const text = Array(20).fill("alpha").join(" ");
    const lines = wrapText(text, 80);
    assert.equal(lines.length, 2);
    assert.equal(lines[0], Array(13).fill("alpha").join(" "));
    assert.equal(lines[1], Array(7).fill("alpha").join(" "));
  });

  it("puts an overlong word on its own line", () => {
    assert.deepEqual(wrapText("ab " + "x".repeat(12) + " cd", 10), ["ab", "x".repeat(12), "cd"]);
  });
});

describe("createFormatOptions", () => {
  it("falls back to four spaces and 80 columns", () => {
    assert.deepEqual(createFormatOptions(), { indent: "    ", width: 80 });
    assert.deepEqual(createFormatOptions(), defaultFormatOptions);
    assert.equal(Object.isFrozen(defaultFormatOptions), true);
    assert.deepEqual(createFormatOptions({ width: -3 }), { indent: "    ", width: 80 });
    assert.deepEqual(createFormatOptions({ indent: "\t", width: 40 }), { indent: "\t", width: 40 });
  });
});

describe("format", () => {
  it("indents children by four spaces", () => {
    assert.equal(format("<user><name>Ali</name></user>"), "<user>\n    <name>Ali</name>\n</user>");
  });

  it("keeps short leaves on one line", () => {
    assert.equal(format("<desc>This is short text</desc>"), "<desc>This is short text</desc>");
  });

  it("wraps a leaf whose text is wider than 80 columns", () => {
    const lines = format("<body>" + "A".repeat(85) + "</body>").split("\n");
    assert.deepEqual(lines, ["<body>", "    " + "A".repeat(85), "</body>"]);
  });

  it("wraps long text one level deeper than its tag", () => {
    const words = Array(20).fill("alpha").join(" ");
    const out = format(`<post><body>${words}</body></post>`);
    assert.deepEqual(out.split("\n"), [
      "<post>",
      "    <body>",
      "        " + Array(13).fill("alpha").join(" "),
      "        " + Array(7).fill("alpha").join(" "),
      "    </body>",
      "</post>"
    ]);
  });

  it("collapses whitespace inside leaves and keeps attributes", () => {
    const xml = [
      '<?xml version="1.0"?>',
      "<users>",
      '<user id="1">',
      "<name>",
      "  Ahmed   Ali",
      "</name>",
      "<posts/>",
      "</user>",
      "</users>"
    ].join("\n");
    assert.equal(format(xml), [
      '<?xml version="1.0"?>',
      "<users>",
      '    <user id="1">',
      "        <name>Ahmed Ali</name>",
      "        <posts/>",
      "    </user>",
      "</users>"
    ].join("\n"));
  });

  it("prints mixed content line by line at the current level", () => {
    assert.equal(
      format("<p>Hello <b>x</b> world\n   again</p>"),
      "<p>\n    Hello\n    <b>x</b>\n    world\n    again\n</p>"
    );
  });

  it("does not indent below zero for stray closing tags", () => {
    assert.equal(format("</a></b><c>x</c>"), "</a>\n</b>\n<c>x</c>");
  });

  it("honours custom indent and width", () => {
    assert.equal(
      format("<topics><topic>one two three</topic></topics>", { indent: "  ", width: 8 }),
      "<topics>\n  <topic>\n    one two\n    three\n  </topic>\n</topics>"
    );
  });

  it("is idempotent", () => {
    const xml = [
      "<users><user><id>1</id>",
      "<name>Ahmed Ali</name><posts><post><body>",
      "Lorem ipsum dolor sit amet, consectetur adipiscing elit, sed do eiusmod tempor incididunt ut labore et dolore magna aliqua.",
      "</body><topics><topic>economy</topic></topics></post></posts>",
      "<followers><follower><id>2</id></follower></followers></user></users>"
    ].join("\n");
    const once = format(xml);
    assert.equal(format(once), once);
  });

  it("returns an empty string for empty input", () => {
    assert.equal(format(""), "");
  });
});
