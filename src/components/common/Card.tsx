interface Props {
  title?: string;
  actions?: React.ReactNode;
  error?: string | null;
  children?: React.ReactNode;
  className?: string;
}

export function Card({ title, actions, error, children, className = "" }: Props) {
  return (
    <div
      className={`rounded-lg border border-[var(--color-border)] bg-[var(--color-surface)] ${className}`}
    >
      {(title || actions) && (
        <div className="px-4 py-2.5 border-b border-[var(--color-border)] flex items-center justify-between gap-3">
          <span className="text-sm font-medium">{title}</span>
          {actions}
        </div>
      )}
      {/* 로드 실패 시 본문 대신 메시지 */}
      {error ? (
        <div className="p-4 text-sm text-[var(--color-red)]">{error}</div>
      ) : (
        <div className="p-4">{children}</div>
      )}
    </div>
  );
}
