import { RuleTable } from "../src/rules.ts";
import { EX } from "./namespace.ts";

/** Anchors `hasLicense` to P7, `HardwareModule` to Q3 and `rdf:type` to P31. */
export const licenseScenario = `
  ex:HardwareModule a owl:Class ;
    rdfs:label "Hardware module"@en .
  ex:hasLicense a owl:DatatypeProperty ;
    rdfs:label "has license"@en .
  ex:myModule a ex:HardwareModule ;
    rdfs:label "My module"@en ;
    ex:hasLicense "MIT" .`;

export function licenseScenarioRules(): RuleTable {
  return RuleTable.create({
    prefixes: { ex: EX("").value },
    types: {
      "owl:Class": { kind: "item", class: true },
      "owl:DatatypeProperty": { kind: "property", datatype: "string" },
    },
    anchors: {
      "ex:hasLicense": { id: "P7", datatype: "string" },
      "ex:HardwareModule": { id: "Q3" },
      "rdf:type": { id: "P31", datatype: "wikibase-item" },
    },
  });
}

/** Two parts pointing at each other. */
export const mutualParts = `
  ex:Part a owl:Class .
  ex:hasComponent a owl:ObjectProperty ;
    rdfs:range ex:Part .
  ex:left a ex:Part ;
    rdfs:label "Left"@en ;
    ex:hasComponent ex:right .
  ex:right a ex:Part ;
    rdfs:label "Right"@en ;
    ex:hasComponent ex:left .`;

/** A node with an unmapped predicate, and a node of an unknown type. */
export const partlyMapped = `
  ex:Module a owl:Class .
  ex:licence a owl:DatatypeProperty .
  ex:lamp a ex:Module ;
    rdfs:label "Lamp"@en ;
    ex:licence "MIT" ;
    ex:colour "red" .
  ex:gadget a ex:Unknown ;
    rdfs:label "Gadget"@en .`;
