import { graphviz } from "node-graphviz";

export async function renderDotToSVG(dotGraph: string): Promise<string> {
  return await graphviz.layout(dotGraph);
}

export function generateGraphvizOnlineLink(dotGraph: string): string {
  const baseUrl = "https://dreampuf.github.io/GraphvizOnline/#";
  return baseUrl + encodeURIComponent(dotGraph);
}
