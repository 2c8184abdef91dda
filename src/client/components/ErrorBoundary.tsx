import { Component, ErrorInfo, ReactNode } from "react";
import { Alert, Container } from "react-bootstrap";

interface ErrorBoundaryProps {
  children?: ReactNode;
}

interface ErrorBoundaryState {
  error: Error | null;
  errorInfo: ErrorInfo | null;
}

export class ErrorBoundary extends Component<
  ErrorBoundaryProps,
  ErrorBoundaryState
> {
  constructor(props: ErrorBoundaryProps) {
    super(props);
    this.state = { error: null, errorInfo: null };
  }

  static getDerivedStateFromError(error: Error): ErrorBoundaryState {
    return { error, errorInfo: null };
  }

  componentDidCatch(error: Error, errorInfo: ErrorInfo) {
    console.error("ErrorBoundary caught an error from children:", error, errorInfo);
    this.setState({ errorInfo });
  }

  render() {
    const { error, errorInfo } = this.state;
    if (!error) {
      return this.props.children || null;
    }
    return (
      <Container className="pt-3">
        <Alert variant="danger">
          <Alert.Heading>Oops! Something Went Wrong</Alert.Heading>
          <p>{error.toString()}</p>
          {errorInfo?.componentStack && (
            <details style={{ whiteSpace: "pre-wrap" }}>
              {errorInfo.componentStack}
            </details>
          )}
          <hr />
          <p className="mb-0">Please try refreshing the page.</p>
        </Alert>
      </Container>
    );
  }
}
