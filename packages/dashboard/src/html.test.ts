import { present, unavailable } from "@sreit/core";
import { insufficient, ok } from "@sreit/indicators";
import { describe, expect, it } from "vitest";
import { escapeHtml, fixed, indicatorCell, metricCell, renderRichText, signedPct } from "./html";

describe("escapeHtml", () => {
	it("escapes markup characters", () => {
		expect(escapeHtml(`<a href="x">'&'</a>`)).toBe(
			"&lt;a href=&quot;x&quot;&gt;&#39;&amp;&#39;&lt;/a&gt;"
		);
	});
});

describe("cells", () => {
	it("formats present values and titles missing ones", () => {
		expect(indicatorCell(ok(61.234), fixed(1))).toBe("61.2");
		expect(indicatorCell(insufficient<number>(15, 3), fixed(1))).toBe(
			'<span class="na" title="insufficient data">—</span>'
		);
		expect(metricCell(present(0.87), fixed(2, "x"))).toBe("0.87x");
		expect(metricCell(unavailable(), fixed(2, "x"))).toBe(
			'<span class="na" title="unavailable">—</span>'
		);
	});

	it("signs percentage changes", () => {
		expect(signedPct(1.5)).toBe("+1.50%");
		expect(signedPct(-0.25)).toBe("-0.25%");
		expect(signedPct(0)).toBe("0.00%");
	});
});

describe("renderRichText", () => {
	it("escapes before applying bold spans and paragraphs", () => {
		expect(renderRichText("**Overview**: calm <b>week</b>\n\nSecond\nline\n")).toBe(
			"<p><strong>Overview</strong>: calm &lt;b&gt;week&lt;/b&gt;</p>\n<p>Second<br>line</p>"
		);
	});
});
