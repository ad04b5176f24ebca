import type { Notice } from '@/lib/analysis/types';

export function NoticeBanner({ notice }: { notice: Notice }) {
  return (
    <div
      role="status"
      data-kind={notice.kind}
      className="my-2 rounded border-l-4 border-brand bg-paper px-3 py-2 text-sm text-[#333]"
    >
      {notice.message}
    </div>
  );
}

export function ErrorBanner({ message }: { message: string }) {
  return (
    <div role="alert" className="my-2 rounded border-l-4 border-red-600 bg-red-50 px-3 py-2 text-sm text-red-900">
      {message}
    </div>
  );
}
