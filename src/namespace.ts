import namespace from "@rdfjs/namespace";

export const RDF = namespace("http://www.w3.org/1999/02/22-rdf-syntax-ns#");
export const RDFS = namespace("http://www.w3.org/2000/01/rdf-schema#");
export const OWL = namespace("http://www.w3.org/2002/07/owl#");
export const XSD = namespace("http://www.w3.org/2001/XMLSchema#");
export const SKOS = namespace("http://www.w3.org/2004/02/skos/core#");
export const DC = namespace("http://purl.org/dc/elements/1.1/");
export const DCTERMS = namespace("http://purl.org/dc/terms/");
export const Schema = namespace("http://schema.org/");
export const SPDX = namespace("http://spdx.org/rdf/terms#");
export const OBO = namespace("http://purl.obolibrary.org/obo/");
export const EPO = namespace("http://data.epo.org/linked-data/def/patent/");
export const VS = namespace("http://www.w3.org/2003/06/sw-vocab-status/ns#");

/** Prefixes understood in the rule table and written into Turtle output. */
export const PREFIXES: Record<string, string> = {
  rdf: RDF("").value,
  rdfs: RDFS("").value,
  owl: OWL("").value,
  xsd: XSD("").value,
  skos: SKOS("").value,
  dc: DC("").value,
  dcterms: DCTERMS("").value,
  schema: Schema("").value,
  spdx: SPDX("").value,
  obo: OBO("").value,
  epo: EPO("").value,
  vs: VS("").value,
};
