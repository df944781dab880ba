/**
 * Dashboard HTML Renderer
 *
 * Produces a self-contained page: styling and charting come from CDNs, the
 * aggregated data is embedded as a JSON literal and the browser script in
 * client-script.ts renders charts and tables from it. The output depends
 * only on its inputs, so unchanged sheet data yields a byte-identical file.
 */

import type { DashboardData } from "./aggregate";
import { CLIENT_SCRIPT } from "./client-script";

/**
 * Page texts and appearance
 */
export interface RenderOptions {
  pageTitle?: string;
  title?: string;
  subtitle?: string;
  footer?: string;
  /** URL or path (relative to the page) of a full-page background image */
  backgroundImage?: string;
}

export const DEFAULT_RENDER_OPTIONS: Required<RenderOptions> = {
  pageTitle: "LMSM 2025",
  title: "Relatóriu Atuál Progresu Rejistrasaun Selebrasaun LMSM 2025",
  subtitle: "SESIM-KNTLU",
  footer: "© Relatóriu Atuál Rejistrasaun LMSM 2025, SESIM-KNTLU. All rights reserved.",
  backgroundImage: "",
};

const HTML_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;",
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

/**
 * Serializes data for a <script> block. `<` is escaped so a cell containing
 * "</script>" cannot end the block; U+2028/U+2029 are escaped for older
 * engines that reject them in string literals.
 */
export function embedJson(value: unknown): string {
  return JSON.stringify(value)
    .replace(/</g, "\\u003c")
    .replace(/\u2028/g, "\\u2028")
    .replace(/\u2029/g, "\\u2029");
}

function backgroundCss(url: string): string {
  if (!url) {
    return "";
  }
  // Quotes, backslashes and "<" would end the CSS string or the style block
  const cssUrl = url.replace(/["\\\n\r<]/g, (ch) => `\\${ch.charCodeAt(0).toString(16)} `);
  return `
      body {
        background-image: url("${cssUrl}");
        background-size: cover;
        background-repeat: no-repeat;
        background-position: center center;
        background-attachment: fixed;
      }
      .bg-white, .bg-blue-50 { background-color: rgba(255, 255, 255, 0.9); }
      header, footer { position: relative; z-index: 10; }
      .text-indigo-800, .text-indigo-700, .text-blue-600, .text-gray-800 {
        text-shadow: 0px 0px 2px rgba(255,255,255,0.7);
      }`;
}

const CARD =
  "bg-white p-6 rounded-xl shadow-lg hover:shadow-xl transition-shadow duration-300 transform hover:-translate-y-1";
const SELECT =
  "p-3 border border-gray-300 rounded-lg shadow-sm focus:ring-2 focus:ring-blue-400 focus:border-transparent transition-all duration-200 text-gray-700 bg-white";
const TH = "px-4 py-2 text-left text-xs font-medium text-blue-700 uppercase tracking-wider";

function summaryCard(id: string, label: string): string {
  return `
      <div class="${CARD} flex flex-col items-center justify-center">
        <h2 class="text-2xl font-bold text-indigo-500 mb-3">${label}</h2>
        <p id="${id}" class="text-5xl font-extrabold text-purple-600"></p>
      </div>`;
}

function chartCard(id: string, heading: string, wide = false): string {
  const span = wide ? " md:col-span-2 lg:col-span-2" : "";
  return `
      <div class="${CARD}${span}">
        <h2 class="text-2xl font-bold text-indigo-700 mb-3">${heading}</h2>
        <div class="chart-container"><canvas id="${id}"></canvas></div>
      </div>`;
}

/**
 * Renders the complete dashboard document.
 */
export function renderDashboard(
  data: DashboardData,
  options: RenderOptions = {},
): string {
  const defaults = DEFAULT_RENDER_OPTIONS;
  const opts: Required<RenderOptions> = {
    pageTitle: options.pageTitle || defaults.pageTitle,
    title: options.title || defaults.title,
    subtitle: options.subtitle || defaults.subtitle,
    footer: options.footer || defaults.footer,
    backgroundImage: options.backgroundImage || defaults.backgroundImage,
  };

  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>${escapeHtml(opts.pageTitle)}</title>
  <script src="https://cdn.tailwindcss.com"></script>
  <link href="https://fonts.googleapis.com/css2?family=Inter:wght@400;600;700;800&display=swap" rel="stylesheet">
  <script src="https://cdn.jsdelivr.net/npm/chart.js"></script>
  <script src="https://cdn.jsdelivr.net/npm/chartjs-plugin-datalabels@2.0.0"></script>
  <style>
      body { font-family: 'Inter', sans-serif; }${backgroundCss(opts.backgroundImage)}
      canvas { max-width: 100%; height: 250px; }
      .chart-container { position: relative; height: 250px; width: 100%; }
      .detailed-table-wrapper {
        overflow: auto;
        max-height: 500px;
        border-radius: 0.5rem;
        border: 1px solid #e2e8f0;
        box-shadow: 0 4px 6px -1px rgba(0, 0, 0, 0.1), 0 2px 4px -1px rgba(0, 0, 0, 0.06);
      }
      .detailed-table-wrapper table { min-width: 100%; border-collapse: collapse; }
      .detailed-table-wrapper thead { position: sticky; top: 0; z-index: 10; background-color: #eff6ff; }
      .detailed-table-wrapper th {
        padding: 0.75rem 1.5rem;
        text-align: left;
        font-size: 0.75rem;
        font-weight: 500;
        color: #1d4ed8;
        text-transform: uppercase;
        letter-spacing: 0.05em;
        border-bottom: 1px solid #cbd5e0;
      }
      .detailed-table-wrapper td {
        padding: 1rem 1.5rem;
        white-space: nowrap;
        font-size: 0.875rem;
        color: #1f2937;
        border-bottom: 1px solid #f3f4f6;
      }
      .detailed-table-wrapper tbody tr:last-child td { border-bottom: none; }
      .detailed-table-wrapper tbody tr:hover { background-color: #f9fafb; }
      .pagination-controls button:disabled { opacity: 0.5; cursor: not-allowed; }
  </style>
</head>
<body class="min-h-screen p-6 text-gray-800">
  <header class="text-center mb-10">
    <h1 class="text-5xl font-extrabold text-indigo-600 mb-2 rounded-lg p-2 shadow-sm">${escapeHtml(opts.title)}</h1>
    <p class="text-lg font-extrabold text-indigo-700">${escapeHtml(opts.subtitle)}</p>
  </header>

  <section class="grid grid-cols-1 md:grid-cols-4 gap-6 mb-8">${summaryCard("totalMunicipality", "🏙️ Munisípiu")}${summaryCard("totalGender", "👥 Seksu")}${summaryCard("totalDiscipline", "📚 Dixiplina")}${summaryCard("totalTopic", "📚 Tópiku LMSM")}
  </section>

  <section id="summary-section" class="grid grid-cols-1 md:grid-cols-2 lg:grid-cols-2 gap-6 mb-10">${chartCard("genderChart", "Persentajen tuir Jéneru")}${chartCard("ageChart", "Distribuisaun tuir Idade")}${chartCard("disciplineChart", "Tópiku tuir kada Dixiplina")}${chartCard("schoolLevelChart", "Distribuisaun Tópiku tuir Nivel Eskola")}${chartCard("municipalityChart", "Distribuisaun Tópiku tuir Munisípiu", true)}
      <div class="${CARD} md:col-span-2 lg:col-span-2">
        <h2 class="text-2xl font-bold text-indigo-700 mb-3">Tabela kona-ba eskola ne'ebé rejistu hosi kada Munisípiu</h2>
        <div class="max-h-60 overflow-y-auto rounded-lg border border-gray-200 shadow-sm">
          <table class="min-w-full divide-y divide-gray-200">
            <thead class="bg-blue-50">
              <tr>
                <th scope="col" class="${TH}">Munisípiu</th>
                <th scope="col" class="${TH}">Naran Eskola</th>
                <th scope="col" class="${TH}">Totál</th>
              </tr>
            </thead>
            <tbody class="bg-white divide-y divide-gray-100" id="schoolMunicipalityTableBody"></tbody>
          </table>
        </div>
      </div>
  </section>

  <section class="bg-white p-6 rounded-xl shadow-lg mb-10">
    <h2 class="text-3xl font-bold text-indigo-800 mb-6">Tabela informasaun detallu kona-ba partisipante ne'ebe rejistu</h2>
    <div class="mb-6 flex flex-wrap items-center gap-4">
      <label for="schoolLevelFilter" class="text-lg font-semibold text-gray-700">Filtru tuir Nivel Eskola:</label>
      <select id="schoolLevelFilter" class="${SELECT}"></select>
      <label for="municipalityFilter" class="text-lg font-semibold text-gray-700">Filtru tuir Munisípiu:</label>
      <select id="municipalityFilter" class="${SELECT}"></select>
      <label for="detailedTableSearch" class="sr-only">Search</label>
      <div class="relative flex-grow">
        <input type="text" id="detailedTableSearch" placeholder="Buka dadus..."
          class="p-3 border border-gray-300 rounded-lg shadow-sm focus:ring-2 focus:ring-blue-400 focus:border-transparent transition-all duration-200 w-full text-gray-700">
      </div>
      <select id="rowsPerPage" class="${SELECT}">
        <option value="10">10</option>
        <option value="25">25</option>
        <option value="50">50</option>
        <option value="100">100</option>
        <option value="All">Hotu</option>
      </select>
    </div>
    <div id="detailed-table-container" class="detailed-table-wrapper"></div>
    <div class="pagination-controls flex justify-between items-center mt-4">
      <button id="prevPage" class="px-4 py-2 bg-blue-600 text-white rounded-lg hover:bg-blue-700 transition-colors duration-200">Anterior</button>
      <span class="text-gray-700">Pájina <span id="currentPageSpan">1</span> hosi <span id="totalPagesSpan">1</span></span>
      <button id="nextPage" class="px-4 py-2 bg-blue-600 text-white rounded-lg hover:bg-blue-700 transition-colors duration-200">Tuirmai</button>
    </div>
  </section>

  <footer class="text-center text-gray-600 text-sm mt-10">
    <p>${escapeHtml(opts.footer)}</p>
  </footer>

  <script>
const dashboardData = ${embedJson(data)};
${CLIENT_SCRIPT}
  </script>
</body>
</html>
`;
}
