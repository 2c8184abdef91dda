import { Navbar, Container } from "react-bootstrap";
import { formulateUrl } from "../utils.js";

export default function AppNavbar({ title }: { title?: string }) {
  return (
    <>
      {import.meta.env.DEV && <div style={{ backgroundColor: "green", color: "white" }}><Container>DEVELOPMENT SERVER</Container></div>}
      <Navbar expand="lg" className="bg-dark" variant="dark">
        <Container>
          <Navbar.Brand href={formulateUrl("")} className="text-white">
            {title || "Grade Distribution Analyzer"}
          </Navbar.Brand>
        </Container>
      </Navbar>
    </>
  );
}
