/**
 * Built-in layer rules for each strictness profile.
 */
import { WILDCARD, type LayerRuleDefinition, type StrictnessProfile } from './types.js';

const NETWORK_DEPENDENCIES = ['reqwest', 'hyper', 'actix-web', 'warp', 'axum', 'surf', 'ureq'];
const UI_DEPENDENCIES = ['gtk', 'egui', 'tauri', 'druid', 'iced', 'conrod', 'cursive', 'tui', 'crossterm'];
// Core should go through abstracted I/O
const FILESYSTEM_DEPENDENCIES = ['notify', 'walkdir', 'glob', 'directories'];

function wildcardAll(names: string[]): Record<string, typeof WILDCARD> {
  return Object.fromEntries(names.map((name) => [name, WILDCARD]));
}

const FULL_CORE: LayerRuleDefinition = {
  name: 'core',
  filePatterns: [
    'src/core/**/*.rs',
    'src/lib.rs',
    'src/error.rs',
    'src/language_detector*.rs',
    'src/translator*.rs',
    'src/translation*.rs',
  ],
  forbiddenImports: ['ui', 'network', 'filesystem', 'web', 'http', 'tcp', 'gui'],
  // Substring matching: std::path::Path also covers PathBuf
  forbiddenStdImports: ['std::net', 'std::fs', 'std::path::Path'],
  forbiddenDependencies: {
    // Other tokio features are fine
    tokio: ['net', 'tcp', 'udp'],
    ...wildcardAll(NETWORK_DEPENDENCIES),
    ...wildcardAll(UI_DEPENDENCIES),
    ...wildcardAll(FILESYSTEM_DEPENDENCIES),
  },
  apiPatterns: [
    { pattern: 'tokio::net::', description: 'uses tokio networking' },
    { pattern: 'tokio::fs::', description: 'uses tokio filesystem access' },
    { pattern: 'TcpListener', description: 'uses socket type TcpListener' },
    { pattern: 'TcpStream', description: 'uses socket type TcpStream' },
    { pattern: 'UdpSocket', description: 'uses socket type UdpSocket' },
  ],
};

const SIMPLIFIED_IMPORT_PATTERNS = [
  'tokio::net::',
  'tokio::fs::',
  'std::net::',
  'std::fs::',
  'use\\s+reqwest',
  'use\\s+hyper',
  'use\\s+actix_web',
  'use\\s+warp',
  'use\\s+gtk',
  'use\\s+egui',
  'use\\s+tauri',
  'use\\s+walkdir',
  'use\\s+notify',
];

const SIMPLIFIED_CORE: LayerRuleDefinition = {
  name: 'core',
  filePatterns: ['src/**/*.rs'],
  forbiddenDependencies: wildcardAll([
    ...NETWORK_DEPENDENCIES,
    ...UI_DEPENDENCIES.filter((name) => name !== 'crossterm'),
    ...FILESYSTEM_DEPENDENCIES,
  ]),
  importPatterns: SIMPLIFIED_IMPORT_PATTERNS.map((pattern) => ({
    pattern,
    description: 'imports forbidden layer',
  })),
};

export const PROFILE_DEFINITIONS: Record<StrictnessProfile, readonly LayerRuleDefinition[]> = {
  full: [FULL_CORE],
  simplified: [SIMPLIFIED_CORE],
};
