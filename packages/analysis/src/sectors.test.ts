import { describe, expect, it } from "vitest";
import { getSectorCategory } from "./sectors";

describe("getSectorCategory", () => {
	it("maps single asset class segments", () => {
		expect(getSectorCategory("Industrial & Logistics")).toBe("Industrial");
		expect(getSectorCategory("Retail (Suburban)")).toBe("Retail");
		expect(getSectorCategory("Grade A Office")).toBe("Office");
		expect(getSectorCategory("Healthcare")).toBe("Healthcare");
		expect(getSectorCategory("Hotels & Serviced Residences")).toBe("Hospitality");
		expect(getSectorCategory("Data Centres")).toBe("Data Centre");
	});

	it("treats mixed or unknown segments as diversified", () => {
		expect(getSectorCategory("Retail & Office")).toBe("Diversified");
		expect(getSectorCategory("Diversified")).toBe("Diversified");
		expect(getSectorCategory("Student Housing")).toBe("Diversified");
	});
});
