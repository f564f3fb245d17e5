import type { AgencyCode } from "../../../config/agencies";

export type AgencyPersona = {
  writer: string;
  reviewer: string;
  rubric: string[];
  phraseUpgrades: { weak: string; strong: string }[];
};

export const AGENCY_PERSONAS: Record<AgencyCode, AgencyPersona> = {
  nsf: {
    writer:
      "You are an expert grant writer who has won and reviewed many NSF SBIR Phase I awards. You know NSF funds high-risk technical innovation, not product development.",
    reviewer:
      "You are a demanding NSF SBIR panel reviewer. You are adversarial but constructive: find every weakness a panel would score down, and say how to fix it.",
    rubric: [
      "Intellectual merit: is there a genuine, unproven technical hypothesis?",
      "Broader impacts: who benefits beyond the company?",
      "Commercial impact: is there evidence of real customer demand?",
    ],
    phraseUpgrades: [
      {
        weak: "We will develop a revolutionary platform.",
        strong:
          "Phase I will test whether the sensor achieves 5 cm detection at 800 km, which no passive system has shown.",
      },
      {
        weak: "There is a huge market.",
        strong:
          "Interviews with 30 satellite operators identified 12 willing to pilot at $40K per year.",
      },
      {
        weak: "Our team is highly experienced.",
        strong:
          "The PI built two RF tracking systems that are in daily use by commercial operators.",
      },
    ],
  },
  dod: {
    writer:
      "You are an expert DoD SBIR proposal writer who has supported many Phase I awards. You write to the topic, quantify the capability gap, and respect SWaP-C constraints.",
    reviewer:
      "You are a DoD technical point of contact evaluating SBIR Phase I proposals against a published topic. Be adversarial but constructive; flag anything a source selection board would mark as a weakness.",
    rubric: [
      "Technical merit and innovation against the topic objective",
      "Qualifications of the PI and team",
      "Transition and dual-use commercialization potential",
    ],
    phraseUpgrades: [
      {
        weak: "This technology could help the military.",
        strong:
          "The system closes the small-debris tracking gap identified in the topic, with a 40% SWaP-C reduction over fielded radar.",
      },
      {
        weak: "We plan to commercialize widely.",
        strong:
          "A named prime has agreed to evaluate the Phase II prototype for integration into its program of record.",
      },
      {
        weak: "We will test the prototype.",
        strong:
          "Month 5 field test at a government range will verify detection at TRL 5 against threshold values.",
      },
    ],
  },
  nasa: {
    writer:
      "You are an expert NASA SBIR proposal writer. You align every claim to the subtopic, state TRL entry and exit, and show infusion into NASA missions.",
    reviewer:
      "You are a NASA subtopic manager reviewing SBIR Phase I proposals. Be adversarial but constructive; identify what would lower the score on merit, team or work plan.",
    rubric: [
      "Scientific and technical merit of the innovation",
      "Experience, qualifications and facilities",
      "Effectiveness of the work plan and commercial potential",
    ],
    phraseUpgrades: [
      {
        weak: "This will benefit space exploration.",
        strong:
          "The tracker supplies conjunction data that the subtopic identifies as a gap for lunar gateway logistics.",
      },
      {
        weak: "The technology is mature.",
        strong:
          "The innovation enters at TRL 3 from bench results and exits Phase I at TRL 4 after relevant-environment tests.",
      },
    ],
  },
};
