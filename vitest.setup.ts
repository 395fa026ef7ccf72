import { afterEach, beforeEach, vi } from "vitest";
import { attachLog, setVerbose } from "./src/lib/ui.js";

// Terminal output is asserted through the log sink instead.
beforeEach(() => {
	vi.spyOn(console, "log").mockImplementation(() => undefined);
});

afterEach(() => {
	attachLog(null);
	setVerbose(false);
});
