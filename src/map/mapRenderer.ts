import fs from 'fs/promises';
import {Resvg} from '@resvg/resvg-js';
import {booleanClockwise} from '@turf/boolean-clockwise';
import {geoMercator, geoPath} from 'd3-geo';
import type {Position} from 'geojson';
import {logger} from '../config/logger.js';
import {Clinic, HighwayGeometry, MappedRegion, RegionGeometry} from '../types/domain.js';
import {MapTheme, classify} from './themes.js';

export type MapRenderOptions = {
	theme: MapTheme;
	width: number;
	height: number;
	clinics?: Clinic[];
	highways?: HighwayGeometry[];
	subtitle?: string;
};

const MARGIN = 24;
const HEADER_HEIGHT = 72;
const LEGEND_WIDTH = 300;
const LEGEND_ROW = 30;
const FONT_FAMILY = 'DejaVu Sans, Arial, sans-serif';
const CLINIC_COLOR = '#08306b';
const HIGHWAY_COLOR = '#525252';

export function escapeXml(text: string): string {
	return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;').replace(/"/g, '&quot;').replace(/'/g, '&apos;');
}

function orientRings(rings: Position[][]): Position[][] {
	// d3 takes spherical polygons: exterior clockwise, holes counter-clockwise
	return rings.map((ring, index) => (booleanClockwise(ring) === (index === 0) ? ring : [...ring].reverse()));
}

export function orientForProjection(geometry: RegionGeometry): RegionGeometry {
	if (geometry.type === 'Polygon') {
		return {type: 'Polygon', coordinates: orientRings(geometry.coordinates)};
	}
	return {type: 'MultiPolygon', coordinates: geometry.coordinates.map(orientRings)};
}

type LegendEntry = {
	label: string;
	swatch: string;
};

function legendSvg(entries: LegendEntry[], title: string, x: number, y: number): string {
	const rows = entries.map((entry, index) => {
		const rowY = y + 36 + index * LEGEND_ROW;
		return `<g class="legend-entry">${entry.swatch.replace(/\{x\}/g, String(x)).replace(/\{y\}/g, String(rowY))}<text x="${x + 32}" y="${rowY + 15}" font-size="16">${escapeXml(entry.label)}</text></g>`;
	});
	return `<g class="legend" font-family="${FONT_FAMILY}" fill="#252525"><text x="${x}" y="${y + 16}" font-size="18" font-weight="bold">${escapeXml(title)}</text>${rows.join('')}</g>`;
}

function rectSwatch(color: string): string {
	return `<rect x="{x}" y="{y}" width="22" height="20" fill="${color}" stroke="#636363" stroke-width="0.5"/>`;
}

/**
 * Draw the regions as a choropleth SVG of fixed size, legend on the right.
 */
export function buildMapSvg(regions: MappedRegion[], options: MapRenderOptions): string {
	if (regions.length === 0) {
		throw new Error('Cannot draw a map without regions');
	}

	const {theme, width, height} = options;
	const collection = {
		type: 'FeatureCollection' as const,
		features: regions.map((region) => ({type: 'Feature' as const, properties: {}, geometry: orientForProjection(region.geometry)})),
	};
	const extent: [[number, number], [number, number]] = [
		[MARGIN, HEADER_HEIGHT],
		[width - LEGEND_WIDTH - MARGIN, height - MARGIN],
	];
	const projection = geoMercator().fitExtent(extent, collection);
	const path = geoPath(projection);

	const polygons = regions.flatMap((region, index) => {
		const feature = collection.features[index];
		const d = feature ? path(feature) : null;
		if (!d) return [];
		const {color} = classify(theme, theme.value(region));
		return [`<path data-geoid="${escapeXml(region.geoid)}" d="${d}" fill="${color}" fill-rule="evenodd" stroke="#ffffff" stroke-width="0.4"/>`];
	});

	const highways = (options.highways ?? []).flatMap((geometry) => {
		const d = path(geometry);
		return d ? [`<path d="${d}" fill="none" stroke="${HIGHWAY_COLOR}" stroke-width="1.6" stroke-linejoin="round"/>`] : [];
	});

	const clinics = (options.clinics ?? []).flatMap((clinic) => {
		const projected = projection([clinic.longitude, clinic.latitude]);
		if (!projected) return [];
		const [cx, cy] = projected;
		return [`<circle cx="${cx.toFixed(2)}" cy="${cy.toFixed(2)}" r="5" fill="${CLINIC_COLOR}" stroke="#ffffff" stroke-width="1.2"/>`];
	});

	const legendEntries: LegendEntry[] = [
		...theme.bins.map((bin) => ({label: bin.label, swatch: rectSwatch(bin.color)})),
		{label: theme.missingLabel, swatch: rectSwatch(theme.missingColor)},
	];
	if (clinics.length > 0) {
		legendEntries.push({label: 'PrEP clinic', swatch: `<circle cx="{x}" cy="{y}" r="6" fill="${CLINIC_COLOR}" transform="translate(11 10)"/>`});
	}
	if (highways.length > 0) {
		legendEntries.push({label: 'Highway', swatch: `<rect x="{x}" y="{y}" width="22" height="2" fill="${HIGHWAY_COLOR}" transform="translate(0 9)"/>`});
	}

	const subtitle = options.subtitle ? `<text x="${MARGIN}" y="60" font-size="16" fill="#525252">${escapeXml(options.subtitle)}</text>` : '';

	return [
		`<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}" viewBox="0 0 ${width} ${height}" data-theme="${theme.id}">`,
		`<rect width="${width}" height="${height}" fill="#ffffff"/>`,
		`<text x="${MARGIN}" y="36" font-family="${FONT_FAMILY}" font-size="26" font-weight="bold" fill="#252525">${escapeXml(theme.title)}</text>`,
		subtitle,
		`<g class="regions">${polygons.join('')}</g>`,
		`<g class="highways">${highways.join('')}</g>`,
		`<g class="clinics">${clinics.join('')}</g>`,
		legendSvg(legendEntries, theme.legendTitle, width - LEGEND_WIDTH + MARGIN, HEADER_HEIGHT),
		'</svg>',
	].join('\n');
}

export function rasterizeSvg(svg: string): Buffer {
	const resvg = new Resvg(svg, {
		fitTo: {mode: 'original'},
		font: {loadSystemFonts: true, defaultFontFamily: 'DejaVu Sans'},
	});
	return resvg.render().asPng();
}

/**
 * Write `<basePath>.svg` and `<basePath>.png`.
 */
export async function renderMapFiles(regions: MappedRegion[], options: MapRenderOptions, basePath: string): Promise<{svgPath: string; pngPath: string}> {
	const svg = buildMapSvg(regions, options);
	const svgPath = `${basePath}.svg`;
	const pngPath = `${basePath}.png`;
	await fs.writeFile(svgPath, svg, 'utf8');
	await fs.writeFile(pngPath, rasterizeSvg(svg));
	logger.info({theme: options.theme.id, pngPath, width: options.width, height: options.height}, 'Map rendered');
	return {svgPath, pngPath};
}
