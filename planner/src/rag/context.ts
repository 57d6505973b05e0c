import type { ContextBundle } from "./crossProject.js";

export function buildContext(bundle: ContextBundle): string {
  if (bundle.items.length === 0) {
    return "[이전 프로젝트 대화]\n관련 기록 없음";
  }
  const blocks = bundle.items.map(
    (item) => `PROJECT: ${item.projectName}\nROLE: ${item.role}\n${item.snippet}`
  );
  return `[이전 프로젝트 대화]\n${blocks.join("\n\n---\n\n")}`;
}
