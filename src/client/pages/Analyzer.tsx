import { useState } from "react";
import { Alert, Card, Col, Container, Row } from "react-bootstrap";
import AppNavbar from "../components/Navbar.js";
import GradeInputForm from "../components/GradeInputForm.js";
import StatsSummary from "../components/StatsSummary.js";
import { Histogram } from "../components/Histogram.js";
import { type AnalyzeFormData, type GradeAnalysis } from "../../types/stats.js";
import { formulateUrl, getSafeErrorResponse } from "../utils.js";

export default function AnalyzerPage() {
  const [analysis, setAnalysis] = useState<GradeAnalysis | null>(null);
  const [errorMessage, setErrorMessage] = useState<string | null>(null);

  const analyze = async (data: AnalyzeFormData) => {
    setErrorMessage(null);
    try {
      const response = await fetch(formulateUrl("api/v1/analyze"), {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(data),
      });
      if (!response.ok) {
        const { message } = await getSafeErrorResponse(
          response,
          "Failed to analyze grades.",
        );
        setAnalysis(null);
        setErrorMessage(message);
        return;
      }
      setAnalysis((await response.json()) as GradeAnalysis);
    } catch (e: unknown) {
      console.error("Error analyzing grades:", e);
      setAnalysis(null);
      setErrorMessage(
        e instanceof Error ? e.message : "An unexpected error occurred.",
      );
    }
  };

  return (
    <div style={{ minHeight: "100vh", display: "flex", flexDirection: "column" }}>
      <AppNavbar />
      <Container className="pt-3">
        <p className="text-muted">
          Enter a list of grades to see their mean, median, standard deviation
          and distribution.
        </p>
        <Row className="g-3">
          <Col lg={4}>
            <Card className="p-3">
              <GradeInputForm onSubmit={analyze} />
            </Card>
            {errorMessage && (
              <Alert variant="danger" className="mt-3" dismissible onClose={() => setErrorMessage(null)}>
                {errorMessage}
              </Alert>
            )}
          </Col>
          <Col lg={8}>
            {analysis && (
              <Card className="p-3">
                <Histogram
                  histogram={analysis.histogram}
                  mean={analysis.stats.mean}
                  median={analysis.stats.median}
                />
                <StatsSummary analysis={analysis} />
              </Card>
            )}
          </Col>
        </Row>
      </Container>
    </div>
  );
}
