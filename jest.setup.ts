import { afterEach } from "@jest/globals";
import { cleanup } from "ink-testing-library";

// Unmount every rendered ink instance so its timers cannot keep Jest alive.
afterEach(() => {
  cleanup();
});
