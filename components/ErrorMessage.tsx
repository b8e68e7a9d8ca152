"use client";

type ErrorMessageProps = {
  message: string;
  onDismiss?: () => void;
};

export default function ErrorMessage({ message, onDismiss }: ErrorMessageProps) {
  return (
    <div role="alert" className="error-message">
      <span>{message}</span>
      {onDismiss && (
        <button type="button" onClick={onDismiss} className="error-dismiss" aria-label="Dismiss error">
          ×
        </button>
      )}
    </div>
  );
}
