/**
 * ╔═══════════════════════════════════════════════════════════════════════════╗
 * ║                           ⇄  UPSTREAM RELAY  ⇄                            ║
 * ║                            Startup Banner                                 ║
 * ╚═══════════════════════════════════════════════════════════════════════════╝
 *
 * @packageDocumentation
 */

const WIDTH = 77

function boxLine(text: string): string {
	const padding = WIDTH - text.length
	const left = Math.floor(padding / 2)
	return '║' + ' '.repeat(left) + text + ' '.repeat(padding - left) + '║'
}

/**
 * Banner lines for a service name and version.
 */
export function bannerLines(name: string, version: string): string[] {
	return [
		'╔' + '═'.repeat(WIDTH) + '╗',
		boxLine(name.toUpperCase().split('').join(' ')),
		boxLine(`v${version}`),
		'╚' + '═'.repeat(WIDTH) + '╝',
	]
}

/**
 * Prints the startup banner.
 */
export function displayBanner(name: string, version: string): void {
	console.log('\n' + bannerLines(name, version).join('\n') + '\n')
}
