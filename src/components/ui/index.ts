export { Button } from './Button';
export { Input } from './Input';
export { Skeleton, SkeletonText } from './Skeleton';
export { ToastProvider, useToast } from './Toast';
export { Pill, pillVariantFor, type PillVariant } from './Pill';
export { ProgressBar } from './ProgressBar';
export {
  SearchIcon,
  FilmIcon,
  AlertCircleIcon,
  XIcon,
  DownloadIcon,
  ExternalLinkIcon,
  CopyIcon,
  CalendarIcon,
} from './Icons';
