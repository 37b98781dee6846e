// CHANGE: Run the layering rules as part of the test suite
// WHY: CORE purity is only worth something if a regression fails `npm test`

import * as path from "node:path";
import { fileURLToPath } from "node:url";

import { Project } from "ts-morph";
import { describe, expect, it } from "vitest";

import { collectViolations } from "../scripts/architecture-rules.js";

const root = fileURLToPath(new URL("..", import.meta.url));

describe("architecture rules", () => {
	it("finds no errors under src/", () => {
		const project = new Project({ skipAddingFilesFromTsConfig: true });
		project.addSourceFilesAtPaths(path.join(root, "src/**/*.ts"));
		expect(project.getSourceFiles().length).toBeGreaterThan(0);

		const errors = collectViolations(project.getSourceFiles()).filter(
			(v) => v.severity === "error",
		);
		expect(errors).toEqual([]);
	});

	it("reports impure or misplaced CORE code", () => {
		const project = new Project({ useInMemoryFileSystem: true });
		project.createSourceFile(
			"/repo/src/core/bad.ts",
			'import { helper } from "../shell/helper.js";\nexport function leak(): void {\n\tconsole.log(helper);\n}\n',
		);
		project.createSourceFile(
			"/repo/src/shell/upward.ts",
			'import { assess } from "../app/runAssessment.js";\nexport const run = assess;\n',
		);

		const violations = collectViolations(project.getSourceFiles());
		expect(violations.map((v) => [v.rule, v.line, v.severity])).toEqual([
			["core-no-shell-imports", 1, "error"],
			["core-purity", 3, "error"],
			["core-documentation", 2, "warning"],
			["shell-no-app-imports", 1, "error"],
		]);
	});
});
