import 'dotenv/config';
import { ColumnAliases, loadColumnAliases } from './column-aliases';

/**
 * Where the merge looks for its inputs and writes its output, relative to the base directory.
 */
export interface MergeLayout {
  pinFileName: string;
  pinSheetName: string;
  senderFileName: string;
  inputDirName: string;
  outputDirName: string;
  outputFilePrefix: string;
}

export interface AppConfig {
  baseDirectory: string;
  layout: MergeLayout;
  columnAliases: ColumnAliases;
}

export const DEFAULT_LAYOUT: MergeLayout = {
  pinFileName: 'PIN.xlsx',
  pinSheetName: 'TBLPINCITY',
  senderFileName: 'Sender Address.xlsx',
  inputDirName: 'Input',
  outputDirName: 'Output',
  outputFilePrefix: 'Output-Post_File_'
};

function readSetting(name: string, fallback: string): string {
  const value = process.env[name];
  if (value === undefined) {
    return fallback;
  }
  if (value.trim() === '') {
    throw new Error(`${name} must not be empty`);
  }
  return value.trim();
}

export function loadConfig(argv: string[] = process.argv.slice(2)): AppConfig {
  const baseDirectory = argv[0] || process.env.MERGE_BASE_DIRECTORY || process.cwd();

  return {
    baseDirectory,
    layout: {
      pinFileName: readSetting('PIN_FILE_NAME', DEFAULT_LAYOUT.pinFileName),
      pinSheetName: readSetting('PIN_SHEET_NAME', DEFAULT_LAYOUT.pinSheetName),
      senderFileName: readSetting('SENDER_FILE_NAME', DEFAULT_LAYOUT.senderFileName),
      inputDirName: readSetting('INPUT_DIR_NAME', DEFAULT_LAYOUT.inputDirName),
      outputDirName: readSetting('OUTPUT_DIR_NAME', DEFAULT_LAYOUT.outputDirName),
      outputFilePrefix: readSetting('OUTPUT_FILE_PREFIX', DEFAULT_LAYOUT.outputFilePrefix)
    },
    columnAliases: loadColumnAliases()
  };
}
