/**
 * Browser-side script of the generated dashboard. It reads the embedded
 * `dashboardData` object, draws the charts and drives the detailed table's
 * filters, search and pagination.
 *
 * Kept as plain ES2017 so it runs unbundled in any current browser.
 */
export const CLIENT_SCRIPT = String.raw`
Chart.register(ChartDataLabels);

let currentPage = 1;
let rowsPerPage = 10;
let currentSearchTerm = '';
let currentSchoolLevelFilter = 'All';
let currentMunicipalityFilter = 'All';

const PALETTE = [
    'rgba(75, 192, 192, 0.6)', 'rgba(153, 102, 255, 0.6)', 'rgba(255, 159, 64, 0.6)',
    'rgba(255, 99, 132, 0.6)', 'rgba(54, 162, 235, 0.6)', 'rgba(201, 203, 207, 0.6)',
    'rgba(255, 205, 86, 0.6)', 'rgba(100, 149, 237, 0.6)', 'rgba(255, 0, 255, 0.6)',
    'rgba(0, 255, 0, 0.6)', 'rgba(0, 0, 255, 0.6)', 'rgba(128, 0, 128, 0.6)'
];

const DETAIL_COLUMNS = [
    ['timestamp', 'Timestamp'],
    ['municipality', 'Munisípiu'],
    ['schoolLevel', 'Nivel Eskola'],
    ['schoolName', 'Naran Eskola'],
    ['studentName', 'Naran Kanorin'],
    ['gender', 'Seksu'],
    ['age', 'Idade'],
    ['discipline', 'Dixiplina'],
    ['topic', 'Títulu/Tópiku'],
    ['documents', 'Dokumentu']
];

function escapeHtml(value) {
    return String(value)
        .replace(/&/g, '&amp;')
        .replace(/</g, '&lt;')
        .replace(/>/g, '&gt;')
        .replace(/"/g, '&quot;')
        .replace(/'/g, '&#39;');
}

function generateColors(count) {
    return Array.from({ length: count }, (_, i) => PALETTE[i % PALETTE.length]);
}

function createBarChart(canvasId, series) {
    const ctx = document.getElementById(canvasId).getContext('2d');
    const colors = generateColors(series.labels.length);
    new Chart(ctx, {
        type: 'bar',
        data: {
            labels: series.labels,
            datasets: [{
                label: 'Totál',
                data: series.data,
                backgroundColor: colors,
                borderColor: colors.map(color => color.replace('0.6', '1')),
                borderWidth: 1
            }]
        },
        options: {
            responsive: true,
            maintainAspectRatio: false,
            plugins: {
                legend: { display: false },
                datalabels: {
                    anchor: 'end',
                    align: 'top',
                    formatter: value => value,
                    color: '#333',
                    font: { weight: 'bold' }
                }
            },
            scales: {
                y: { beginAtZero: true, ticks: { precision: 0 } }
            }
        }
    });
}

function createPieChart(canvasId, series) {
    const ctx = document.getElementById(canvasId).getContext('2d');
    new Chart(ctx, {
        type: 'pie',
        data: {
            labels: series.labels,
            datasets: [{
                label: 'Pursentu',
                data: series.data,
                backgroundColor: generateColors(series.labels.length),
                borderColor: '#fff',
                borderWidth: 2
            }]
        },
        options: {
            responsive: true,
            maintainAspectRatio: false,
            plugins: {
                legend: { position: 'bottom', labels: { font: { size: 12 } } },
                datalabels: {
                    formatter: (value, context) => {
                        const sum = context.chart.data.datasets[0].data.reduce((a, b) => a + b, 0);
                        return sum > 0 ? (value * 100 / sum).toFixed(1) + '%' : '';
                    },
                    color: '#fff',
                    font: { weight: 'bold', size: 14 }
                }
            }
        }
    });
}

function renderCharts() {
    createPieChart('genderChart', dashboardData.genderChart);
    createBarChart('ageChart', dashboardData.ageChart);
    createBarChart('disciplineChart', dashboardData.disciplineChart);
    createPieChart('schoolLevelChart', dashboardData.schoolLevelChart);
    createBarChart('municipalityChart', dashboardData.municipalityTopChart);
}

function renderSchoolMunicipalityTable() {
    const tableBody = document.getElementById('schoolMunicipalityTableBody');
    const rows = dashboardData.schoolMunicipalityTable;
    if (rows.length === 0) {
        tableBody.innerHTML = '<tr><td colspan="3" class="px-4 py-2 text-center text-gray-500">' +
            "La-iha dadus eskola ne'ebé disponivel.</td></tr>";
        return;
    }
    tableBody.innerHTML = rows.map(row =>
        '<tr class="hover:bg-gray-50 transition-colors duration-150">' +
        '<td class="px-4 py-2 whitespace-nowrap text-sm text-gray-900">' + escapeHtml(row.municipality) + '</td>' +
        '<td class="px-4 py-2 whitespace-nowrap text-sm text-gray-900">' + escapeHtml(row.schoolName) + '</td>' +
        '<td class="px-4 py-2 whitespace-nowrap text-sm text-gray-900">' + escapeHtml(row.total) + '</td>' +
        '</tr>'
    ).join('');
}

function filteredRecords() {
    let records = dashboardData.detailedRecords;
    if (currentSchoolLevelFilter !== 'All') {
        records = records.filter(row => row.schoolLevel === currentSchoolLevelFilter);
    }
    if (currentMunicipalityFilter !== 'All') {
        records = records.filter(row => row.municipality === currentMunicipalityFilter);
    }
    if (currentSearchTerm) {
        const needle = currentSearchTerm.toLowerCase();
        records = records.filter(row =>
            DETAIL_COLUMNS.some(([key]) => String(row[key]).toLowerCase().includes(needle))
        );
    }
    return records;
}

function totalPagesFor(count) {
    return rowsPerPage === 'All' ? (count > 0 ? 1 : 0) : Math.ceil(count / rowsPerPage);
}

function renderDetailedTable() {
    const records = filteredRecords();
    const totalPages = totalPagesFor(records.length);
    if (currentPage > totalPages) {
        currentPage = totalPages;
    }
    if (currentPage < 1 && totalPages > 0) {
        currentPage = 1;
    }

    const start = rowsPerPage === 'All' ? 0 : (currentPage - 1) * rowsPerPage;
    const end = rowsPerPage === 'All' ? records.length : start + rowsPerPage;
    const page = records.slice(Math.max(start, 0), end);

    let html = '<table class="min-w-full divide-y divide-gray-200"><thead><tr>' +
        DETAIL_COLUMNS.map(([, label]) => '<th scope="col">' + label + '</th>').join('') +
        '</tr></thead><tbody class="bg-white divide-y divide-gray-100">';

    if (page.length > 0) {
        html += page.map(row =>
            '<tr class="hover:bg-gray-50 transition-colors duration-150">' +
            DETAIL_COLUMNS.map(([key]) => '<td>' + escapeHtml(row[key]) + '</td>').join('') +
            '</tr>'
        ).join('');
    } else {
        html += '<tr><td colspan="' + DETAIL_COLUMNS.length + '" class="px-6 py-4 text-center text-gray-500">' +
            "La-iha dadus ne'ebé disponivel aliña ho filtrasaun atuál.</td></tr>";
    }
    html += '</tbody></table>';
    document.getElementById('detailed-table-container').innerHTML = html;

    document.getElementById('currentPageSpan').textContent = currentPage;
    document.getElementById('totalPagesSpan').textContent = totalPages;
    document.getElementById('prevPage').disabled = currentPage <= 1;
    document.getElementById('nextPage').disabled = currentPage >= totalPages;
}

function fillSelect(select, options) {
    select.innerHTML = '';
    options.forEach(option => {
        const element = document.createElement('option');
        element.value = option;
        element.textContent = option;
        select.appendChild(element);
    });
    select.value = 'All';
}

function bindControls() {
    const schoolLevelSelect = document.getElementById('schoolLevelFilter');
    fillSelect(schoolLevelSelect, dashboardData.schoolLevelOptions);
    schoolLevelSelect.addEventListener('change', event => {
        currentSchoolLevelFilter = event.target.value;
        currentPage = 1;
        renderDetailedTable();
    });

    const municipalitySelect = document.getElementById('municipalityFilter');
    fillSelect(municipalitySelect, dashboardData.municipalityOptions);
    municipalitySelect.addEventListener('change', event => {
        currentMunicipalityFilter = event.target.value;
        currentPage = 1;
        renderDetailedTable();
    });

    document.getElementById('detailedTableSearch').addEventListener('input', event => {
        currentSearchTerm = event.target.value;
        currentPage = 1;
        renderDetailedTable();
    });

    document.getElementById('rowsPerPage').addEventListener('change', event => {
        rowsPerPage = event.target.value === 'All' ? 'All' : parseInt(event.target.value, 10);
        currentPage = 1;
        renderDetailedTable();
    });

    document.getElementById('prevPage').addEventListener('click', () => {
        if (currentPage > 1) {
            currentPage--;
            renderDetailedTable();
        }
    });

    document.getElementById('nextPage').addEventListener('click', () => {
        if (currentPage < totalPagesFor(filteredRecords().length)) {
            currentPage++;
            renderDetailedTable();
        }
    });
}

document.addEventListener('DOMContentLoaded', () => {
    document.getElementById('totalMunicipality').textContent = dashboardData.totalMunicipality;
    document.getElementById('totalGender').textContent = dashboardData.totalGender;
    document.getElementById('totalDiscipline').textContent = dashboardData.totalDiscipline;
    document.getElementById('totalTopic').textContent = dashboardData.totalTopic;

    renderCharts();
    renderSchoolMunicipalityTable();
    bindControls();
    renderDetailedTable();
});
`;
