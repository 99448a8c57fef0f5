export interface DomainProfile {
  label: string;
  matches: (domain: string) => boolean;
  description: string[];
}

const contains = (...needles: string[]) => (domain: string) => needles.some((n) => domain.includes(n));

// Checked in order; the first matching profile describes the host
export const DOMAIN_PROFILES: DomainProfile[] = [
  {
    label: 'search-engine',
    matches: contains('google'),
    description: [
      "This website is Google's search engine and technology platform.",
      'Google provides a wide range of services including web search, email (Gmail), cloud computing services (Google Cloud Platform), productivity tools (Google Workspace), and various other online tools and services.',
      'The website is accessible and responding correctly based on the connectivity tests.',
    ],
  },
  {
    label: 'aws',
    matches: contains('amazon', 'aws'),
    description: [
      'This is an Amazon Web Services (AWS) endpoint providing cloud infrastructure services.',
      'AWS offers a comprehensive suite of cloud computing services including load balancers for traffic distribution, compute resources (EC2, Lambda), storage solutions (S3, EBS), networking services (VPC, CloudFront), and many other managed services.',
      "This endpoint appears to be part of AWS's infrastructure for managing and delivering cloud services.",
    ],
  },
  {
    label: 'azure',
    matches: contains('microsoft', 'azure'),
    description: [
      'This is a Microsoft Azure service endpoint providing cloud computing services.',
      "Azure is Microsoft's cloud platform offering infrastructure as a service (IaaS), platform as a service (PaaS), and software as a service (SaaS) solutions.",
      'It provides services for computing, storage, networking, databases, AI, and other enterprise solutions.',
    ],
  },
  {
    label: 'github',
    matches: contains('github'),
    description: [
      'This is GitHub, a web-based platform for version control and software development collaboration.',
      'GitHub provides hosting for Git repositories, code collaboration tools, issue tracking, pull requests, and various integrations for software development workflows.',
      "It's widely used by developers and organizations for managing source code and collaborative software development.",
    ],
  },
  {
    label: 'kubernetes',
    matches: contains('kubernetes', 'k8s'),
    description: [
      'This is a Kubernetes service endpoint providing container orchestration and management capabilities.',
      'Kubernetes is an open-source platform for automating deployment, scaling, and management of containerized applications.',
      'It helps manage clusters of containers across multiple hosts and provides features like automatic scaling, service discovery, and load balancing.',
    ],
  },
  {
    label: 'localhost',
    matches: contains('localhost', '127.0.0.1'),
    description: [
      'This is a localhost or local network endpoint, typically used for local development or internal services.',
      'Localhost refers to the current computer being used, and services running on localhost are typically only accessible from the same machine.',
      'This is commonly used during development and testing phases before deploying services to production environments.',
    ],
  },
  {
    label: 'cluster-service',
    matches: (domain) => domain.endsWith('.svc.cluster.local'),
    description: [
      'This is a Kubernetes internal service endpoint within a cluster.',
      "Services with the '.svc.cluster.local' domain are internal Kubernetes services that are accessible only within the cluster.",
      'These are used for service discovery and communication between different components of applications running in the Kubernetes cluster.',
    ],
  },
  {
    label: 'load-balancer',
    matches: contains('elb.amazonaws.com', 'alb'),
    description: [
      'This is an AWS Elastic Load Balancer (ALB) or Application Load Balancer endpoint.',
      'Load balancers are used to distribute incoming traffic across multiple targets (such as EC2 instances, containers, or IP addresses) to ensure high availability and fault tolerance.',
      'They help improve the availability and scalability of your applications by automatically routing traffic to healthy targets and handling traffic spikes.',
    ],
  },
  {
    label: 'cdn',
    matches: contains('cloudfront.net'),
    description: [
      'This is an AWS CloudFront CDN (Content Delivery Network) endpoint.',
      'CloudFront is a global content delivery network that speeds up distribution of static and dynamic web content by caching content at edge locations closer to users.',
      'It helps reduce latency and improve performance for users accessing your content from different geographic locations around the world.',
    ],
  },
];

export function describeDomain(domain: string): string {
  const lower = domain.toLowerCase();
  const profile = DOMAIN_PROFILES.find((p) => p.matches(lower));
  if (profile) {
    return profile.description.join(' ');
  }

  return [
    `Based on the connectivity tests performed, this website (${domain}) is online and responding correctly.`,
    'The domain is resolving properly, the required ports are open, and the service is accessible.',
    "However, to determine the specific purpose or functionality of this website, you would need to visit the URL directly in a browser or consult the website's documentation, as the connectivity tests only verify network accessibility, not the actual content or services provided.",
  ].join(' ');
}
