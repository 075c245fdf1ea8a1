import { Command, Option } from 'commander'

import { LOG_LEVELS } from '../logging/logger.js'

export function buildProgram() {
  return new Command()
    .name('slidesift')
    .description(
      'Extract distinct slide screenshots from a screen-recorded lecture video (ffmpeg scene detection + duplicate removal).'
    )
    .argument('[video]', 'Video file to extract slides from')
    .option(
      '--scene-threshold <value>',
      'Scene sensitivity for ffmpeg scene detection (0.05-0.7; lower catches more changes). Default: 0.25.'
    )
    .option(
      '--similarity <value>',
      'Duplicate removal strictness (0-1; higher keeps more frames). Default: 0.92.'
    )
    .option('-o, --out <dir>', 'Folder for exported slide images (default: <video>_extracted-slides).')
    .option('--pdf [file]', 'Also write a PDF, one slide per page (default: <video>_extracted-slides.pdf).')
    .option('--no-images', 'Do not export slide images (use with --pdf or --keep-temp).')
    .option('--workers <count>', 'Parallel fingerprinting workers (1-16). Default: 4.')
    .option('--timeout <duration>', 'ffmpeg timeout, e.g. 90s, 10m, 1h. Default: 30m.')
    .option('--ffmpeg <path>', 'ffmpeg binary (default: FFMPEG_PATH, config ffmpeg.path, then PATH).')
    .option('--keep-temp', 'Keep the work dir with every candidate frame.', false)
    .option('--json', 'Print a JSON summary instead of text.', false)
    .addOption(
      new Option('--log-level <level>', 'Log verbosity on stderr.').choices([...LOG_LEVELS])
    )
    .addOption(new Option('--log-format <format>', 'Log line format.').choices(['json', 'pretty']))
    .option('-V, --version', 'Print version and exit.', false)
    .showHelpAfterError()
}
