import { writeFileSync } from 'node:fs';
import type { EdgeRoleAnnotation, WorkText } from '../types/index.js';
import { EdgeRole } from '../types/index.js';
import type { CitationGraph } from '../graph/assembler.js';
import { renderableEdges } from '../roles/orchestrator.js';
import { normalizeOpenAlexId } from '../sources/utils.js';
import { getLogger } from '../utils/logger.js';

export const ROLE_COLORS: Readonly<Record<EdgeRole, string>> = {
    [EdgeRole.SUPPORT]: '#10b981',
    [EdgeRole.DISPUTE]: '#ef4444',
    [EdgeRole.BACKGROUND]: '#64748b',
    [EdgeRole.METHOD]: '#64748b',
};

export interface ViewerNode {
    data: {
        id: string;
        label: string;
        title: string;
        doi: string;
        year: number | '';
        supporting: number;
        contradicting: number;
        mentioning: number;
        total: number;
        tooltip: string;
        size: number;
    };
}

export interface ViewerEdge {
    data: {
        id: string;
        source: string;
        target: string;
        role: EdgeRole;
        confidence: number;
        reason: string;
        color: string;
    };
}

export interface ViewerElements {
    nodes: ViewerNode[];
    edges: ViewerEdge[];
}

/**
 * Cytoscape elements for the viewer. Every graph node is drawn; an edge is
 * drawn only when it carries a role annotation. Untitled works without a
 * label show their short OpenAlex id.
 */
export function buildViewerElements(
    graph: CitationGraph,
    annotations: readonly EdgeRoleAnnotation[],
    texts: ReadonlyMap<string, WorkText>
): ViewerElements {
    const nodes: ViewerNode[] = graph.mapNodes((id, attributes) => {
        const label = texts.get(id)?.label ?? (attributes.title.slice(0, 40) || normalizeOpenAlexId(id));
        const tooltip = [
            attributes.title || id,
            `supporting ${attributes.supporting} · contradicting ${attributes.contradicting} · mentioning ${attributes.mentioning}`,
        ].join('\n');

        return {
            data: {
                id,
                label,
                title: attributes.title,
                doi: attributes.doi,
                year: attributes.year,
                supporting: attributes.supporting,
                contradicting: attributes.contradicting,
                mentioning: attributes.mentioning,
                total: attributes.total,
                tooltip,
                size: Math.round(20 + Math.min(40, Math.sqrt(attributes.total) * 4)),
            },
        };
    });

    const edges: ViewerEdge[] = renderableEdges(graph, annotations).map((annotation, index) => ({
        data: {
            id: `e${index}`,
            source: annotation.citing_id,
            target: annotation.cited_id,
            role: annotation.role,
            confidence: annotation.confidence,
            reason: annotation.reason,
            color: ROLE_COLORS[annotation.role],
        },
    }));

    return { nodes, edges };
}

/**
 * JSON safe to embed in an inline <script>.
 */
export function embedJson(value: unknown): string {
    return JSON.stringify(value)
        .replace(/</g, '\\u003c')
        .replace(/\u2028/g, '\\u2028')
        .replace(/\u2029/g, '\\u2029');
}

/**
 * Generate a self-contained HTML viewer using Cytoscape.js.
 */
export function writeViewer(
    graph: CitationGraph,
    annotations: readonly EdgeRoleAnnotation[],
    texts: ReadonlyMap<string, WorkText>,
    outputPath: string,
    title = 'Citation roles'
): ViewerElements {
    const elements = buildViewerElements(graph, annotations, texts);
    writeFileSync(outputPath, buildHtml(elements, title), 'utf-8');
    getLogger().info(
        { outputPath, nodes: elements.nodes.length, edges: elements.edges.length },
        'HTML viewer generated'
    );
    return elements;
}

function escapeHtml(value: string): string {
    return value
        .replace(/&/g, '&amp;')
        .replace(/</g, '&lt;')
        .replace(/>/g, '&gt;')
        .replace(/"/g, '&quot;');
}

export function buildHtml(elements: ViewerElements, title: string): string {
    const graphData = embedJson([...elements.nodes, ...elements.edges]);

    return `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="UTF-8">
<meta name="viewport" content="width=device-width, initial-scale=1.0">
<title>${escapeHtml(title)}</title>
<script src="https://unpkg.com/cytoscape@3.30.4/dist/cytoscape.min.js"></script>
<style>
  * { margin: 0; padding: 0; box-sizing: border-box; }
  body {
    font-family: -apple-system, BlinkMacSystemFont, sans-serif;
    background: #0f172a;
    color: #e2e8f0;
    height: 100vh;
    overflow: hidden;
  }
  #cy { width: 100%; height: 100vh; position: absolute; top: 0; left: 0; }
  .panel {
    position: absolute;
    background: rgba(15, 23, 42, 0.9);
    border: 1px solid rgba(100, 116, 139, 0.3);
    border-radius: 10px;
    padding: 12px 16px;
    z-index: 10;
  }
  .header { top: 16px; left: 16px; }
  .header h1 { font-size: 17px; font-weight: 700; }
  .stats { font-size: 12px; color: #94a3b8; }
  .detail-panel {
    bottom: 16px;
    right: 16px;
    width: 360px;
    max-height: 50vh;
    overflow-y: auto;
    display: none;
    font-size: 12px;
    white-space: pre-wrap;
  }
  .detail-panel.active { display: block; }
  .detail-panel h3 { font-size: 14px; margin-bottom: 6px; }
  .legend { bottom: 16px; left: 16px; font-size: 11px; }
  .legend-item { display: flex; align-items: center; gap: 6px; margin: 3px 0; }
  .legend-line { width: 18px; height: 3px; flex-shrink: 0; }
</style>
</head>
<body>
  <div id="cy"></div>

  <div class="panel header">
    <h1>${escapeHtml(title)}</h1>
    <span class="stats">${elements.nodes.length} papers · ${elements.edges.length} annotated citations</span>
  </div>

  <div class="panel detail-panel" id="detail">
    <h3 id="detail-title"></h3>
    <div id="detail-body"></div>
  </div>

  <div class="panel legend">
    <div class="legend-item"><div class="legend-line" style="background:${ROLE_COLORS[EdgeRole.SUPPORT]}"></div> Support</div>
    <div class="legend-item"><div class="legend-line" style="background:${ROLE_COLORS[EdgeRole.DISPUTE]}"></div> Dispute</div>
    <div class="legend-item"><div class="legend-line" style="background:${ROLE_COLORS[EdgeRole.BACKGROUND]}"></div> Background / method</div>
  </div>

<script>
const graphData = ${graphData};

const cy = cytoscape({
  container: document.getElementById('cy'),
  elements: graphData,
  style: [
    {
      selector: 'node',
      style: {
        'label': 'data(label)',
        'background-color': '#6366f1',
        'width': 'data(size)',
        'height': 'data(size)',
        'font-size': '8px',
        'color': '#e2e8f0',
        'text-outline-color': '#0f172a',
        'text-outline-width': 2,
        'text-valign': 'bottom',
        'text-margin-y': 5,
      },
    },
    {
      selector: 'edge',
      style: {
        'width': function(e) { return 1 + e.data('confidence') * 3; },
        'line-color': 'data(color)',
        'target-arrow-color': 'data(color)',
        'target-arrow-shape': 'triangle',
        'curve-style': 'bezier',
        'opacity': 0.7,
      },
    },
    { selector: 'node:selected', style: { 'border-width': 3, 'border-color': '#f59e0b' } },
  ],
  layout: { name: 'cose', animate: false, nodeRepulsion: 8000, idealEdgeLength: 120 },
  wheelSensitivity: 0.3,
});

function showDetail(heading, body) {
  document.getElementById('detail-title').textContent = heading;
  document.getElementById('detail-body').textContent = body;
  document.getElementById('detail').classList.add('active');
}

cy.on('tap', 'node', function(evt) {
  const d = evt.target.data();
  showDetail(d.label, d.tooltip + (d.doi ? '\\nhttps://doi.org/' + d.doi : ''));
});

cy.on('tap', 'edge', function(evt) {
  const d = evt.target.data();
  showDetail(d.role + ' (' + d.confidence.toFixed(2) + ')', d.reason);
});

cy.on('tap', function(evt) {
  if (evt.target === cy) document.getElementById('detail').classList.remove('active');
});
</script>
</body>
</html>
`;
}
