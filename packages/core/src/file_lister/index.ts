export { FileListerError } from './file_lister';
export type {
  FileLister,
  FileListerErrorCode,
  FileListOptions,
  FileStats,
  FsFileListerOptions,
  MockFileListerOptions,
} from './file_lister';
export { FsFileLister } from './fs/fs_file_lister';
export { MockFileLister } from './memory/mock_file_lister';
