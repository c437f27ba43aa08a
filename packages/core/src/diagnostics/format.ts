import { type ContainerRef, formatEndCall, kindNoun } from "../containers/kinds.js";
import type { DiagnosticDetail } from "./types.js";

export const FRAME_ERRORS_BANNER = "=================Errors Occurred in Interface!=================";

function withArticle(noun: string): string {
  return /^[aeiou]/.test(noun) ? `an ${noun}` : `a ${noun}`;
}

function describeExpected(expected: ContainerRef): string {
  return `    We were expecting ${withArticle(kindNoun(expected.kind))} named ${JSON.stringify(expected.name)} instead.`;
}

export function formatDiagnostic(detail: DiagnosticDetail): string {
  switch (detail.code) {
    case "orphanClose": {
      const call = formatEndCall(detail.container);
      const noun = kindNoun(detail.container.kind);
      if (detail.expected === null) {
        return `Unexpected call to ${call} - no ${noun}s (or any other containers at all) started!`;
      }
      return [
        `Unexpected call to ${call} - no ${noun} named ${JSON.stringify(detail.container.name)} started! Maybe it's a typo?`,
        describeExpected(detail.expected),
      ].join("\n");
    }
    case "prematureClose":
      return [
        `${formatEndCall(detail.container)} called too early!`,
        "Make sure to call these first:",
        ...detail.unclosed.map((ref) => `    ${formatEndCall(ref)};`),
      ].join("\n");
    case "unclosedAtDraw": {
      const { container } = detail;
      return `${JSON.stringify(container.name)} (${withArticle(kindNoun(container.kind))}) not closed before drawing! - make sure to call ${formatEndCall(container)}!`;
    }
    case "capacityExceeded": {
      const lines = [
        "Too many interface items have been created without drawing them! Are you forgetting to call beginFrame() and draw()?",
        "The interface has now been cleared, to stop the program from crashing.",
      ];
      if (detail.discarded.length > 0) {
        lines.push(`Discarded open containers: ${detail.discarded.map(formatEndCall).join(", ")}`);
      }
      return lines.join("\n");
    }
    case "frameNotStarted":
      return "Interface function called before beginFrame() - make sure to call this first!";
    case "frameErrors":
      return FRAME_ERRORS_BANNER;
  }
}
