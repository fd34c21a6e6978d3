/**
 * ASS/SSA (Advanced SubStation Alpha) section layouts
 */

/**
 * SubStation dialect
 */
export type SubStationVariant = 'ass' | 'ssa'

/**
 * Style fields written by [V4+ Styles]
 */
export const ASS_STYLE_FIELDS = [
	'Name',
	'Fontname',
	'Fontsize',
	'PrimaryColour',
	'SecondaryColour',
	'OutlineColour',
	'BackColour',
	'Bold',
	'Italic',
	'Underline',
	'StrikeOut',
	'ScaleX',
	'ScaleY',
	'Spacing',
	'Angle',
	'BorderStyle',
	'Outline',
	'Shadow',
	'Alignment',
	'MarginL',
	'MarginR',
	'MarginV',
	'Encoding',
] as const

/**
 * Style fields written by [V4 Styles]
 */
export const SSA_STYLE_FIELDS = [
	'Name',
	'Fontname',
	'Fontsize',
	'PrimaryColour',
	'SecondaryColour',
	'TertiaryColour',
	'BackColour',
	'Bold',
	'Italic',
	'BorderStyle',
	'Outline',
	'Shadow',
	'Alignment',
	'MarginL',
	'MarginR',
	'MarginV',
	'AlphaLevel',
	'Encoding',
] as const

export const ASS_EVENT_FIELDS = ['Layer', 'Start', 'End', 'Style', 'Name', 'MarginL', 'MarginR', 'MarginV', 'Effect', 'Text'] as const

export const SSA_EVENT_FIELDS = ['Marked', 'Start', 'End', 'Style', 'Name', 'MarginL', 'MarginR', 'MarginV', 'Effect', 'Text'] as const

export const STYLES_SECTION: Record<SubStationVariant, string> = {
	ass: 'V4+ Styles',
	ssa: 'V4 Styles',
}

export const SCRIPT_TYPE: Record<SubStationVariant, string> = {
	ass: 'v4.00+',
	ssa: 'v4.00',
}
